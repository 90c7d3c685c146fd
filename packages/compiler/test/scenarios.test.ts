import assert from 'node:assert'
import { describe, it } from 'node:test'
import { printIrFunction } from '../src/ir/printer.ts'
import { compileSource, irFunction, output, run } from './helpers.ts'

describe('scenarios', () => {
	describe('integer modulo', () => {
		const source = '<?php function mod(int $a, int $b): int { return $a % $b; } echo mod(10, 3);'

		it('should lower % on ints to srem behind a zero test', async () => {
			const fn = irFunction(await compileSource(source), 'mod')
			const insts = fn.blocks.flatMap((block) => block.insts)
			assert.strictEqual(insts.filter((inst) => inst.op === 'arith' && inst.kind === 'srem').length, 1)
			assert.strictEqual(insts.filter((inst) => inst.op === 'icmp' && inst.predicate === 'eq').length, 1)
			assert.strictEqual(fn.blocks.filter((block) => block.terminator.op === 'raise').length, 1)
		})

		it('should evaluate to 1', async () => {
			assert.strictEqual(await output(source), '1')
		})

		it('should raise DivisionByZeroError for a zero divisor', async () => {
			const result = await run('<?php function mod(int $a, int $b): int { return $a % $b; } echo mod(1, 0);')
			assert.deepStrictEqual(result.uncaught, { className: 'DivisionByZeroError', message: 'Modulo by zero' })
			assert.deepStrictEqual(result.leaks, [])
		})
	})

	describe('foreach', () => {
		it('should iterate the length the array had when the loop started', async () => {
			const source = `<?php
$items = [1, 2, 3, 4, 5];
$n = 0;
foreach ($items as $item) {
	$items[] = $item * 10;
	$n++;
}
echo $n, ' ', count($items);`
			assert.strictEqual(await output(source), '5 10')
		})

		it('should see the values of the snapshot', async () => {
			const source = `<?php
$items = ['a' => 1, 'b' => 2];
foreach ($items as $key => $value) {
	$items['a'] = 100;
	echo $key, '=', $value, ';';
}`
			assert.strictEqual(await output(source), 'a=1;b=2;')
		})
	})

	describe('switch', () => {
		it('should run the default arm once when no case matches', async () => {
			const source = `<?php
function pick(int $v): string {
	$log = '';
	switch ($v) {
		case 1:
			$log .= 'one;';
			break;
		case 2:
			$log .= 'two;';
			break;
		default:
			$log .= 'default;';
	}
	return $log;
}
echo pick(5);`
			assert.strictEqual(await output(source), 'default;')
		})

		it('should fall through until a break', async () => {
			const source = `<?php
function walk(int $v): void {
	switch ($v) {
		case 1:
			echo 'a';
		case 2:
			echo 'b';
			break;
		default:
			echo 'c';
	}
}
walk(1);`
			assert.strictEqual(await output(source), 'ab')
		})
	})

	describe('parent calls', () => {
		const source = `<?php
class A { public function name(): string { return 'A'; } }
class B extends A { public function name(): string { return 'B>' . parent::name(); } }
class C extends B { public function name(): string { return 'C>' . parent::name(); } }
echo (new C())->name();`

		it('should call the immediate parent directly', async () => {
			const text = printIrFunction(irFunction(await compileSource(source), 'B::name'))
			assert.ok(text.includes('call @A::name('), text)
			assert.ok(!text.includes('vtable_load'), text)
		})

		it('should walk up one level per call', async () => {
			assert.strictEqual(await output(source), 'C>B>A')
		})
	})

	describe('finally', () => {
		it('should run the finally body once before a return inside try', async () => {
			const source = `<?php
function f(): int {
	try {
		echo 'body;';
		return 1;
	} finally {
		echo 'finally;';
	}
}
echo f();`
			assert.strictEqual(await output(source), 'body;finally;1')
		})

		it('should run the finally body after a caught exception', async () => {
			const source = `<?php
try {
	throw new Exception('x');
} catch (Exception $e) {
	echo 'caught:' . $e->getMessage() . ';';
} finally {
	echo 'finally;';
}`
			assert.strictEqual(await output(source), 'caught:x;finally;')
		})

		it('should run the finally body while an exception passes through', async () => {
			const source = `<?php
function g(): void {
	try {
		throw new Exception('out');
	} finally {
		echo 'cleanup;';
	}
}
try {
	g();
} catch (Exception $e) {
	echo $e->getMessage();
}`
			assert.strictEqual(await output(source), 'cleanup;out')
		})
	})
})
