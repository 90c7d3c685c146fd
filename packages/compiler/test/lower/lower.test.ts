import assert from 'node:assert'
import { describe, it } from 'node:test'
import { printIrFunction, printIrModule } from '../../src/ir/printer.ts'
import { compileSource, irFunction } from '../helpers.ts'

function count(text: string, pattern: RegExp): number {
	return text.match(pattern)?.length ?? 0
}

describe('lower', () => {
	it('should lower integer addition to a single machine add', async () => {
		const unit = await compileSource('<?php function add(int $a, int $b): int { return $a + $b; }')
		assert.strictEqual(
			printIrFunction(irFunction(unit, 'add')),
			['function @add(%0 $a: i64, %1 $b: i64): i64 {', 'bb0:', '  %2: i64 = add %0, %1', '  ret %2', '}'].join('\n')
		)
	})

	it('should guard integer division against a zero divisor', async () => {
		const unit = await compileSource('<?php function half(int $a, int $b): int { return $a % $b; }')
		const text = printIrFunction(irFunction(unit, 'half'))
		assert.strictEqual(count(text, / = srem %/g), 1)
		assert.strictEqual(count(text, / = icmp eq /g), 1)
		assert.strictEqual(count(text, /^ {2}raise /gm), 1)
		assert.ok(text.includes(': str = const "Modulo by zero"'))
		assert.ok(text.includes('object_new DivisionByZeroError'))
	})

	it('should call the runtime for integer powers', async () => {
		const unit = await compileSource('<?php function sq(int $a): int { return $a ** 2; }')
		assert.strictEqual(count(printIrFunction(irFunction(unit, 'sq')), /call @rt_ipow\(/g), 1)
	})

	it('should name the entry after the unit', async () => {
		const unit = await compileSource('<?php echo 1;')
		assert.strictEqual(unit.module.name, 'main')
		assert.strictEqual(unit.module.entry, '__main@main')
		assert.deepStrictEqual(
			unit.module.functions.map((fn) => fn.name),
			['__main@main']
		)
	})

	it('should mangle methods with their class', async () => {
		const source = `<?php
class Point {
	public int $x = 0;
	public function getX(): int { return $this->x; }
}
function px(Point $p): int { return $p->getX(); }
echo px(new Point());`
		const unit = await compileSource(source)
		assert.deepStrictEqual(unit.module.functions.map((fn) => fn.name).sort(), ['Point::getX', '__main@main', 'px'])
		const [cls] = unit.module.classes
		assert.deepStrictEqual(cls?.slots, [{ name: 'x', type: 'i64' }])
		assert.deepStrictEqual(cls?.vtable, ['Point::getX'])
		assert.strictEqual(cls?.methods.get('getx'), 'Point::getX')
		assert.strictEqual(count(printIrFunction(irFunction(unit, 'px')), /vtable_load /g), 1)
		assert.strictEqual(count(printIrFunction(irFunction(unit, '__main@main')), /vtable_load /g), 0)
	})

	it('should declare foreign functions as externs', async () => {
		const source = `<?php
#[ffi("libm.so.6", "double cos(double)")]
function cos_native(float $x): float;
echo cos_native(0.0);`
		const unit = await compileSource(source)
		assert.deepStrictEqual(unit.module.externs, [
			{ library: 'libm.so.6', name: 'cos_native', params: ['f64'], returnType: 'f64', symbol: 'cos' },
		])
		const text = printIrModule(unit.module)
		assert.ok(text.includes('\n\nextern @cos_native(f64): f64 from "libm.so.6" symbol cos\n\n'))
		assert.ok(text.includes('call @cos_native('))
	})
})
