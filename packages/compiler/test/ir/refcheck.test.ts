import assert from 'node:assert'
import { describe, it } from 'node:test'
import { InternalCompilerError } from '../../src/core/errors.ts'
import { callMayThrow } from '../../src/ir/abi.ts'
import { simulateRefCounts, verifyRefCounts } from '../../src/ir/refcheck.ts'
import type { IrFunction, IrInst, IrParam, IrTerminator, IrType } from '../../src/ir/types.ts'
import { compileSource, irFunction, output } from '../helpers.ts'

const mayThrow = callMayThrow()

function single(
	insts: IrInst[],
	terminator: IrTerminator,
	values: [number, IrType][],
	params: IrParam[] = [],
	returnType: IrType = 'void'
): IrFunction {
	return { blocks: [{ id: 0, insts, terminator }], name: 'f', params, returnType, values: new Map(values) }
}

const STR: IrInst = { op: 'const', result: 0, type: 'str', value: 'x' }
const RET: IrTerminator = { op: 'ret', value: null }

describe('ir/refcheck', () => {
	it('should accept a value released before the return', () => {
		const fn = single([STR, { op: 'rc_dec', value: 0 }], RET, [[0, 'str']])
		assert.deepStrictEqual(simulateRefCounts(fn, mayThrow), [])
	})

	it('should report a reference still held at the return', () => {
		const fn = single([STR], RET, [[0, 'str']])
		assert.deepStrictEqual(simulateRefCounts(fn, mayThrow), ['@f bb0:end (ret): %0 still holds 1 reference(s)'])
	})

	it('should report a second release', () => {
		const fn = single([STR, { op: 'rc_dec', value: 0 }, { op: 'rc_dec', value: 0 }], RET, [[0, 'str']])
		assert.deepStrictEqual(simulateRefCounts(fn, mayThrow), ['@f bb0:2: %0 released without a reference'])
	})

	it('should treat parameters as borrowed', () => {
		const param: IrParam = { id: 0, name: 's', type: 'str' }
		const borrowed = single([], { op: 'ret', value: 0 }, [[0, 'str']], [param], 'str')
		assert.deepStrictEqual(simulateRefCounts(borrowed, mayThrow), ['@f bb0:end: %0 returned without a reference'])
		const owned = single([{ op: 'rc_inc', value: 0 }], { op: 'ret', value: 0 }, [[0, 'str']], [param], 'str')
		assert.deepStrictEqual(simulateRefCounts(owned, mayThrow), [])
	})

	it('should ignore values that are not handles', () => {
		const fn = single([{ op: 'const', result: 0, type: 'i64', value: 1n }], RET, [[0, 'i64']])
		assert.deepStrictEqual(simulateRefCounts(fn, mayThrow), [])
	})

	it('should throw the problems as an internal error', () => {
		assert.throws(
			() => verifyRefCounts(single([STR], RET, [[0, 'str']]), mayThrow),
			(error: unknown) =>
				error instanceof InternalCompilerError &&
				error.message === 'internal compiler error in refcheck: @f bb0:end (ret): %0 still holds 1 reference(s)'
		)
	})

	it('should only count references for phis of handle type', async () => {
		const source = `<?php
function repeat(int $n): string {
	$s = '';
	$i = 0;
	while ($i < $n) {
		$s = $s . 'x';
		$i++;
	}
	return $s;
}
echo repeat(3);`
		const fn = irFunction(await compileSource(source), 'repeat')
		const phiTypes = fn.blocks.flatMap((block) => block.insts.flatMap((inst) => (inst.op === 'phi' ? [inst.type] : [])))
		assert.deepStrictEqual([...new Set(phiTypes)].sort(), ['i64', 'str'])
		assert.deepStrictEqual(simulateRefCounts(fn, mayThrow), [])
		assert.strictEqual(await output(source), 'xxx')
	})
})
