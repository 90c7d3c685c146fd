import assert from 'node:assert'
import { describe, it } from 'node:test'
import { output, run } from '../helpers.ts'

describe('runtime/interpreter', () => {
	it('should dispatch interface calls on the runtime class', async () => {
		const source = `<?php
interface Shape { public function area(): int; }
class Square implements Shape {
	public int $side = 3;
	public function area(): int { return $this->side * $this->side; }
}
class Strip implements Shape { public function area(): int { return 6; } }
function areaOf(Shape $shape): int { return $shape->area(); }
echo areaOf(new Square()) + areaOf(new Strip());`
		assert.strictEqual(await output(source), '15')
	})

	it('should catch a runtime error through a parent class', async () => {
		const source = `<?php
try {
	echo intdiv(1, 0);
} catch (ArithmeticError $e) {
	echo 'caught: ', $e->getMessage();
}`
		assert.strictEqual(await output(source), 'caught: Division by zero')
	})

	it('should raise UnmatchedPatternError for a value no arm covers', async () => {
		const source = `<?php
function pick(int $n): string { return match($n) { 1 => 'a', 2 => 'b' }; }
echo pick(2);
echo pick(3);`
		const result = await run(source)
		assert.strictEqual(result.output, 'b')
		assert.deepStrictEqual(result.uncaught, { className: 'UnmatchedPatternError', message: 'Unhandled match case 3' })
	})

	it('should keep array order and interpolate keys and values', async () => {
		const source = `<?php
$pairs = ['x' => 1, 'y' => 2];
$pairs['z'] = 3;
foreach ($pairs as $k => $v) { echo "$k=$v "; }
echo count($pairs), ' ', implode(',', array_keys($pairs));`
		assert.strictEqual(await output(source), 'x=1 y=2 z=3 3 x,y,z')
	})

	it('should copy arrays on assignment', async () => {
		const source = `<?php
$a = [1, 2];
$b = $a;
$b[] = 3;
echo count($a), count($b);`
		assert.strictEqual(await output(source), '23')
	})

	it('should read a missing integer key as null', async () => {
		const source = `<?php
$a = [1];
$v = $a[5];
echo '[', $v, ']';
echo $v === null ? 'N' : 'NN';
echo is_null($a[5]) ? 'Y' : 'n';
echo $a[0] + 1;`
		assert.strictEqual(await output(source), '[]NY2')
	})

	it('should read a missing string key as null', async () => {
		const source = `<?php
$m = ['a' => 'x'];
$v = $m['b'];
echo $v === null ? 'N' : 'NN', $m['a'];`
		assert.strictEqual(await output(source), 'Nx')
	})

	it('should fill in default parameter values', async () => {
		const source = `<?php
function twice(int $a = 4): int { return $a * 2; }
echo twice(), ' ', twice(1);`
		assert.strictEqual(await output(source), '8 2')
	})

	it('should share objects between variables', async () => {
		const source = `<?php
class Box { public int $n = 0; }
$a = new Box();
$b = $a;
$b->n = 7;
echo $a->n;`
		assert.strictEqual(await output(source), '7')
	})
})
