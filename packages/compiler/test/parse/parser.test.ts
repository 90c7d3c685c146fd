import assert from 'node:assert'
import { describe, it } from 'node:test'
import type { Expr, Stmt } from '../../src/core/ast.ts'
import { CompilationContext } from '../../src/core/context.ts'
import { matchOnly, parse } from '../../src/parse/parser.ts'
import { parseSource } from '../helpers.ts'

function statements(source: string): readonly Stmt[] {
	return parseSource(source).program.statements
}

function echoed(source: string): Expr {
	const [stmt] = statements(`<?php echo ${source};`)
	assert.ok(stmt?.kind === 'Echo')
	const [expr] = stmt.exprs
	assert.ok(expr)
	return expr
}

describe('parse/parser', () => {
	describe('program', () => {
		it('should record the filename on the program', () => {
			const { program } = parseSource('<?php echo 1;', 'demo.php')
			assert.strictEqual(program.file, 'demo.php')
			assert.strictEqual(program.statements.length, 1)
		})

		it('should accept a closing tag', () => {
			assert.strictEqual(statements('<?php echo 1; ?>').length, 1)
		})

		it('should locate statements by line and column', () => {
			const [, second] = statements('<?php\necho 1;\n  echo 2;')
			assert.deepStrictEqual(second?.loc, { column: 3, line: 3 })
		})
	})

	describe('expressions', () => {
		it('should bind * tighter than +', () => {
			const expr = echoed('1 + 2 * 3')
			assert.ok(expr.kind === 'Binary')
			assert.strictEqual(expr.op, '+')
			assert.deepStrictEqual(expr.left, { kind: 'IntLiteral', loc: { column: 12, line: 1 }, value: 1n })
			assert.ok(expr.right.kind === 'Binary')
			assert.strictEqual(expr.right.op, '*')
		})

		it('should bind + tighter than .', () => {
			const expr = echoed("'a' . 1 + 2")
			assert.ok(expr.kind === 'Binary')
			assert.strictEqual(expr.op, '.')
			assert.ok(expr.right.kind === 'Binary')
			assert.strictEqual(expr.right.op, '+')
		})

		it('should make ** right associative', () => {
			const expr = echoed('2 ** 3 ** 2')
			assert.ok(expr.kind === 'Binary')
			assert.strictEqual(expr.op, '**')
			assert.strictEqual(expr.left.kind, 'IntLiteral')
			assert.ok(expr.right.kind === 'Binary')
			assert.strictEqual(expr.right.op, '**')
		})

		it('should parse hexadecimal and binary integers', () => {
			const hex = echoed('0xff')
			const bin = echoed('0b101')
			assert.ok(hex.kind === 'IntLiteral' && bin.kind === 'IntLiteral')
			assert.strictEqual(hex.value, 255n)
			assert.strictEqual(bin.value, 5n)
		})

		it('should turn an integer literal past the 64-bit range into a float', () => {
			const expr = echoed('9223372036854775808')
			assert.ok(expr.kind === 'FloatLiteral')
			assert.strictEqual(expr.value, 9223372036854775808)
		})

		it('should keep single-quoted strings raw apart from \\\' and \\\\', () => {
			const expr = echoed("'a\\nb\\'c\\\\'")
			assert.ok(expr.kind === 'StringLiteral')
			assert.strictEqual(expr.value, "a\\nb'c\\")
		})

		it('should decode escapes in double-quoted strings', () => {
			const expr = echoed('"tab\\there\\n"')
			assert.ok(expr.kind === 'StringLiteral')
			assert.strictEqual(expr.value, 'tab\there\n')
		})

		it('should split interpolated strings into parts', () => {
			const expr = echoed('"x = $x, y = {$p->y}!"')
			assert.ok(expr.kind === 'InterpolatedString')
			assert.strictEqual(expr.parts.length, 5)
			assert.strictEqual(expr.parts[0], 'x = ')
			const [, variable, , fetch, tail] = expr.parts
			assert.ok(typeof variable === 'object' && variable.kind === 'Variable')
			assert.strictEqual(variable.name, 'x')
			assert.ok(typeof fetch === 'object' && fetch.kind === 'PropertyFetch')
			assert.strictEqual(fetch.name, 'y')
			assert.strictEqual(tail, '!')
		})

		it('should parse parent:: calls as static calls', () => {
			const expr = echoed('parent::greet(1)')
			assert.ok(expr.kind === 'StaticCall')
			assert.strictEqual(expr.className, 'parent')
			assert.strictEqual(expr.method, 'greet')
			assert.strictEqual(expr.args.length, 1)
		})

		it('should parse match with a default arm', () => {
			const expr = echoed("match($v) { 1, 2 => 'low', default => 'high' }")
			assert.ok(expr.kind === 'Match')
			assert.strictEqual(expr.arms.length, 2)
			assert.strictEqual(expr.arms[0]?.conditions?.length, 2)
			assert.strictEqual(expr.arms[1]?.conditions, null)
		})

		it('should mark unsupported constructs instead of failing', () => {
			const expr = echoed('$$name')
			assert.deepStrictEqual(expr, {
				construct: 'variable variables',
				kind: 'UnsupportedExpr',
				loc: { column: 12, line: 1 },
			})
		})
	})

	describe('statements', () => {
		it('should parse foreach with key and value', () => {
			const [stmt] = statements('<?php foreach ($items as $k => $v) { echo $v; }')
			assert.ok(stmt?.kind === 'Foreach')
			assert.strictEqual(stmt.key, 'k')
			assert.strictEqual(stmt.value, 'v')
			assert.strictEqual(stmt.byRef, false)
			assert.strictEqual(stmt.body.length, 1)
		})

		it('should parse switch cases in order with the default marked null', () => {
			const [stmt] = statements('<?php switch ($x) { case 1: echo 1; break; default: echo 2; }')
			assert.ok(stmt?.kind === 'Switch')
			assert.strictEqual(stmt.cases.length, 2)
			assert.notStrictEqual(stmt.cases[0]?.test, null)
			assert.strictEqual(stmt.cases[1]?.test, null)
		})

		it('should parse try with catch types and finally', () => {
			const [stmt] = statements('<?php try { f(); } catch (TypeError | Error $e) { } finally { echo 1; }')
			assert.ok(stmt?.kind === 'Try')
			assert.deepStrictEqual(stmt.catches[0]?.types, ['TypeError', 'Error'])
			assert.strictEqual(stmt.catches[0]?.variable, 'e')
			assert.strictEqual(stmt.finally?.length, 1)
		})

		it('should parse break with a depth', () => {
			const [stmt] = statements('<?php while (true) { while (true) { break 2; } }')
			assert.ok(stmt?.kind === 'While')
			const [inner] = stmt.body
			assert.ok(inner?.kind === 'While')
			assert.deepStrictEqual(inner.body[0], { depth: 2, kind: 'Break', loc: { column: 37, line: 1 } })
		})

		it('should parse both require forms', () => {
			const stmts = statements("<?php require_once 'a.php'; require_once('b.php');")
			assert.deepStrictEqual(
				stmts.map((s) => (s.kind === 'Require' ? s.path : null)),
				['a.php', 'b.php']
			)
		})
	})

	describe('declarations', () => {
		it('should parse a typed function with defaults', () => {
			const [stmt] = statements('<?php function f(int $a, ?string $b = null): float { return 1.0; }')
			assert.ok(stmt?.kind === 'FunctionDecl')
			assert.strictEqual(stmt.name, 'f')
			assert.deepStrictEqual(
				stmt.params.map((p) => [p.name, p.type?.names, p.type?.nullable]),
				[
					['a', ['int'], false],
					['b', ['string'], true],
				]
			)
			assert.strictEqual(stmt.params[1]?.default?.kind, 'NullLiteral')
			assert.deepStrictEqual(stmt.returnType?.names, ['float'])
		})

		it('should keep default values of parameters and properties', () => {
			const [fn, cls] = statements('<?php function f(int $a = 1 + 2) {} class C { public string $s = "x"; }')
			assert.ok(fn?.kind === 'FunctionDecl' && cls?.kind === 'ClassDecl')
			const value = fn.params[0]?.default
			assert.ok(value?.kind === 'Binary')
			assert.strictEqual(value.op, '+')
			assert.deepStrictEqual(cls.properties[0]?.default, {
				kind: 'StringLiteral',
				loc: { column: 66, line: 1 },
				value: 'x',
			})
		})

		it('should fold null out of a union type hint', () => {
			const [stmt] = statements('<?php function f(int|null $a) {}')
			assert.ok(stmt?.kind === 'FunctionDecl')
			assert.deepStrictEqual(stmt.params[0]?.type?.names, ['int'])
			assert.strictEqual(stmt.params[0]?.type?.nullable, true)
		})

		it('should keep attributes and a missing body for foreign functions', () => {
			const [stmt] = statements('<?php #[ffi("libm.so.6", "double cos(double)")] function cos_native(float $x): float;')
			assert.ok(stmt?.kind === 'FunctionDecl')
			assert.strictEqual(stmt.body, null)
			assert.strictEqual(stmt.attributes[0]?.name, 'ffi')
			assert.strictEqual(stmt.attributes[0]?.args.length, 2)
		})

		it('should parse class members with modifiers', () => {
			const source = `<?php
abstract class Shape extends Base implements HasArea {
	const SIDES = 0;
	protected readonly string $name;
	public function __construct(string $name) { $this->name = $name; }
	abstract public function area(): float;
	final public static function make(): int { return 1; }
}`
			const [stmt] = statements(source)
			assert.ok(stmt?.kind === 'ClassDecl')
			assert.strictEqual(stmt.isAbstract, true)
			assert.strictEqual(stmt.parent, 'Base')
			assert.deepStrictEqual(stmt.interfaces, ['HasArea'])
			assert.strictEqual(stmt.constants[0]?.name, 'SIDES')
			assert.strictEqual(stmt.properties[0]?.visibility, 'protected')
			assert.strictEqual(stmt.properties[0]?.isReadonly, true)
			assert.deepStrictEqual(
				stmt.methods.map((m) => [m.name, m.isAbstract, m.isStatic, m.isFinal, m.body === null]),
				[
					['__construct', false, false, false, false],
					['area', true, false, false, true],
					['make', false, true, true, false],
				]
			)
		})
	})

	describe('errors', () => {
		it('should report a syntax error with its position', () => {
			const context = new CompilationContext('<?php\necho 1 +;', { filename: 'bad.php' })
			const result = parse(context)
			assert.strictEqual(result.succeeded, false)
			const [error] = context.getErrors()
			assert.strictEqual(error?.def.code, 'KLPARSE001')
			assert.strictEqual(error?.line, 2)
		})

		it('should reject assignment to a non-variable', () => {
			const context = new CompilationContext('<?php 1 = 2;')
			const result = parse(context)
			assert.strictEqual(result.succeeded, false)
			assert.deepStrictEqual(
				context.getErrors().map((d) => d.message),
				['cannot assign to 1']
			)
		})
	})

	describe('matchOnly', () => {
		it('should tell valid from invalid sources', () => {
			assert.strictEqual(matchOnly('<?php $a = [1, 2];'), true)
			assert.strictEqual(matchOnly('<?php $a = ;'), false)
		})
	})
})
