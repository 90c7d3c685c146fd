import assert from 'node:assert'
import { describe, it } from 'node:test'
import { serializeSymbolTable } from '../../src/check/serialize.ts'
import { resolveSource } from '../helpers.ts'

const SOURCE = `<?php
class Point3 extends Point {
	public int $z = 0;
	public function getX(): int { return 1; }
}
function add(int $a, int $b = 2): int { return $a + $b; }
class Point {
	public int $x = 0;
	public function getX(): int { return $this->x; }
}
#[ffi("libm.so.6", "double cos(double)")]
function cos_native(float $x): float;`

async function serialized(source: string): Promise<string> {
	const { context, resolved } = await resolveSource(source)
	assert.deepStrictEqual(context.getErrors(), [], context.formatAllDiagnostics())
	return serializeSymbolTable(resolved.symbols)
}

describe('check/symbols', () => {
	it('should serialize own declarations sorted by name', async () => {
		assert.strictEqual(
			await serialized(SOURCE),
			[
				'unit main',
				'function add($a: int, $b: int = 2): int',
				'function cos_native($x: float): float ffi(libm.so.6, cos)',
				'class Point',
				'  slot 0 public Point::$x: int = 0',
				'  method public getX(): int',
				'  vtable 0 getx -> Point::getX',
				'class Point3 extends Point',
				'  slot 0 public Point::$x: int = 0',
				'  slot 1 public Point3::$z: int = 0',
				'  method public getX(): int overrides Point',
				'  vtable 0 getx -> Point3::getX',
				'',
			].join('\n')
		)
	})

	it('should produce the same table when resolved twice', async () => {
		assert.strictEqual(await serialized(SOURCE), await serialized(SOURCE))
	})

	it('should leave prelude classes out of a unit table', async () => {
		assert.strictEqual(await serialized('<?php echo 1;'), 'unit main\n')
	})
})
