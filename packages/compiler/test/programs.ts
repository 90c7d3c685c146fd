import fc from 'fast-check'

/**
 * Random well-typed programs for property tests. Every variable is
 * assigned before the generated statements run and every loop is
 * bounded, so each program terminates.
 */

const simpleStatement: fc.Arbitrary<string> = fc.oneof(
	fc.integer({ max: 9, min: 1 }).map((n) => `$a = $a + ${n};`),
	fc.integer({ max: 9, min: 2 }).map((n) => `$b = ($b * ${n}) % 97;`),
	fc.constantFrom('x', 'y', 'z').map((c) => `$s = $s . '${c}';`),
	fc.constant('$arr[] = $a;'),
	fc.constant("echo $a, ',';"),
	fc.constant('$s = strtoupper($s);')
)

function block(statement: fc.Arbitrary<string>): fc.Arbitrary<string> {
	return fc.array(statement, { maxLength: 4, minLength: 1 }).map((list) => list.join('\n'))
}

function statement(depth: number): fc.Arbitrary<string> {
	if (depth === 0) return simpleStatement
	const inner = block(statement(depth - 1))
	return fc.oneof(
		{ weight: 3, arbitrary: simpleStatement },
		{
			weight: 1,
			arbitrary: fc
				.tuple(fc.integer({ max: 20, min: 0 }), inner, inner)
				.map(([n, then, otherwise]) => `if ($a > ${n}) {\n${then}\n} else {\n${otherwise}\n}`),
		},
		{
			weight: 1,
			arbitrary: inner.map((body) => `for ($i${depth} = 0; $i${depth} < 3; $i${depth}++) {\n${body}\n}`),
		},
		{
			weight: 1,
			arbitrary: fc
				.tuple(inner, fc.integer({ max: 20, min: 0 }))
				.map(
					([body, n]) =>
						`try {\n${body}\nif ($a > ${n}) { throw new Exception('t'); }\n} catch (Exception $e) {\n$s = $s . $e->getMessage();\n}`
				),
		}
	)
}

function program(body: string): string {
	return `<?php
function body(int $a): string {
$b = 1;
$s = '';
$arr = [];
${body}
return $s . count($arr) . $b;
}
echo body(3);`
}

/** Programs with branches, loops and exception handlers in `body` */
export const structuredProgram: fc.Arbitrary<string> = block(statement(2)).map(program)

/** Programs whose `body` function has no control flow */
export const straightLineProgram: fc.Arbitrary<string> = block(simpleStatement).map(program)
