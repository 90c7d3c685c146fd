import assert from 'node:assert'
import { describe, it } from 'node:test'
import { CompileError } from '../../src/core/errors.ts'
import { compileSource, errorCodes, resolveSource } from '../helpers.ts'

async function messages(source: string): Promise<string[]> {
	const { context } = await resolveSource(source)
	return context.getErrors().map((d) => d.message)
}

describe('check/checker', () => {
	describe('symbol resolution', () => {
		it('should report an unresolved function', async () => {
			assert.deepStrictEqual(await messages('<?php nope();'), ['unresolved function `nope`'])
		})

		it('should report a variable that is never assigned', async () => {
			assert.deepStrictEqual(await messages('<?php echo $ghost;'), ['unresolved variable `$ghost`'])
		})

		it('should report $this outside a method', async () => {
			assert.deepStrictEqual(await errorCodes('<?php function f(): void { echo $this; }'), ['KLRES001'])
		})

		it('should collect independent errors in one pass', async () => {
			assert.deepStrictEqual(await errorCodes('<?php one(); two(); three();'), ['KLRES001', 'KLRES001', 'KLRES001'])
		})

		it('should resolve functions declared after their first use', async () => {
			const unit = await compileSource('<?php echo later(); function later(): int { return 1; }')
			assert.deepStrictEqual(unit.diagnostics, [])
		})

		it('should report a duplicate function', async () => {
			assert.deepStrictEqual(
				await errorCodes('<?php function f(): void {} function F(): void {}'),
				['KLRES007']
			)
		})
	})

	describe('types', () => {
		it('should report a return value of the wrong type', async () => {
			assert.deepStrictEqual(await messages('<?php function f(): int { return "x"; }'), [
				'type mismatch in return value: expected int, found string',
			])
		})

		it('should accept an int where a float is expected', async () => {
			const unit = await compileSource('<?php function half(float $x): float { return $x / 2; } echo half(3);')
			assert.deepStrictEqual(unit.diagnostics, [])
		})

		it('should report the wrong number of arguments', async () => {
			assert.deepStrictEqual(
				await errorCodes('<?php function f(int $a, int $b): int { return $a; } f(1);'),
				['KLRES011']
			)
		})

		it('should reject throwing a value that is not Throwable', async () => {
			assert.deepStrictEqual(await errorCodes('<?php throw 42;'), ['KLRES002'])
		})
	})

	describe('classes', () => {
		it('should reject access to a private property from outside', async () => {
			const source = '<?php class A { private int $x = 1; } $a = new A(); echo $a->x;'
			assert.deepStrictEqual(await errorCodes(source), ['KLRES004'])
		})

		it('should allow a subclass to reach a protected property', async () => {
			const source = `<?php
class A { protected int $x = 1; }
class B extends A { public function get(): int { return $this->x; } }
echo (new B())->get();`
			const unit = await compileSource(source)
			assert.deepStrictEqual(unit.diagnostics, [])
		})

		it('should reject an override with narrower visibility', async () => {
			const source = `<?php
class A { public function f(): int { return 1; } }
class B extends A { protected function f(): int { return 2; } }`
			assert.deepStrictEqual(await messages(source), ['`B::f` must be public (as in `A::f`) or weaker'])
		})

		it('should reject an override with an incompatible return type', async () => {
			const source = `<?php
class A { public function f(): int { return 1; } }
class B extends A { public function f(): string { return 'x'; } }`
			assert.deepStrictEqual(await errorCodes(source), ['KLRES003'])
		})

		it('should reject overriding a final method', async () => {
			const source = `<?php
class A { final public function f(): int { return 1; } }
class B extends A { public function f(): int { return 2; } }`
			assert.deepStrictEqual(await errorCodes(source), ['KLRES012'])
		})

		it('should reject extending a final class', async () => {
			assert.deepStrictEqual(await errorCodes('<?php final class A {} class B extends A {}'), ['KLRES012'])
		})

		it('should reject instantiating an abstract class', async () => {
			assert.deepStrictEqual(await errorCodes('<?php abstract class A {} new A();'), ['KLRES010'])
		})

		it('should require interface methods to be implemented', async () => {
			const source = '<?php interface Shape { public function area(): float; } class Dot implements Shape {}'
			assert.deepStrictEqual([...new Set(await errorCodes(source))], ['KLRES009'])
		})

		it('should reject writes to a readonly property outside its class', async () => {
			const source = `<?php
class P { public readonly int $x; public function __construct() { $this->x = 1; } }
$p = new P();
$p->x = 2;`
			assert.deepStrictEqual(await errorCodes(source), ['KLRES014'])
		})
	})

	describe('control flow', () => {
		it('should reject break deeper than the enclosing loops', async () => {
			assert.deepStrictEqual(await messages('<?php while (true) { break 2; }'), [
				'`break 2` has no enclosing loop or switch at that depth',
			])
		})

		it('should reject a variable read on a path where it is unassigned', async () => {
			const source = '<?php function f(bool $c): int { if ($c) { $x = 1; } return $x; }'
			assert.deepStrictEqual(await errorCodes(source), ['KLSSA001'])
		})

		it('should accept a variable assigned on every path', async () => {
			const source = '<?php function f(bool $c): int { if ($c) { $x = 1; } else { $x = 2; } return $x; }'
			const unit = await compileSource(source)
			assert.deepStrictEqual(unit.diagnostics, [])
		})
	})

	describe('unsupported constructs', () => {
		it('should name the construct', async () => {
			assert.deepStrictEqual(await messages("<?php eval('1');"), ['unsupported construct: eval'])
		})

		it('should reject closures', async () => {
			assert.deepStrictEqual(await errorCodes('<?php $f = function () { return 1; };'), ['KLRES006'])
		})
	})

	describe('warnings', () => {
		it('should warn about unknown attributes and still compile', async () => {
			const unit = await compileSource('<?php #[Pure] function f(): int { return 1; } echo f();')
			assert.deepStrictEqual(
				unit.diagnostics.map((d) => d.message),
				['unknown attribute `Pure` ignored']
			)
			assert.ok(unit.report.startsWith('warning[KLRES050]: unknown attribute `Pure` ignored\n  --> main.php:1:9'))
		})

		it('should warn about code after a return', async () => {
			const unit = await compileSource('<?php function f(): int { return 1; echo 2; } echo f();')
			assert.deepStrictEqual(
				unit.diagnostics.map((d) => [d.def.code, d.line, d.column]),
				[['KLCFG050', 1, 37]]
			)
		})
	})

	describe('error bound', () => {
		it('should stop collecting at maxErrors and note the rest', async () => {
			await assert.rejects(compileSource('<?php a(); b(); c();', { maxErrors: 2 }), (error: unknown) => {
				assert.ok(error instanceof CompileError)
				assert.strictEqual(error.diagnostics.length, 2)
				assert.ok(error.message.endsWith('note: 1 more error(s) not shown'))
				return true
			})
		})
	})
})
