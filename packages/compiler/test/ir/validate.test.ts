import assert from 'node:assert'
import { describe, it } from 'node:test'
import { InternalCompilerError } from '../../src/core/errors.ts'
import type { IrBlock, IrFunction, IrParam, IrType } from '../../src/ir/types.ts'
import { validateFunction, validateModule } from '../../src/ir/validate.ts'

function fn(blocks: IrBlock[], values: [number, IrType][], params: IrParam[] = [], returnType: IrType = 'i64'): IrFunction {
	return { blocks, name: 'f', params, returnType, values: new Map(values) }
}

function rejects(target: IrFunction, message: string): void {
	assert.throws(
		() => validateFunction(target),
		(error: unknown) => error instanceof InternalCompilerError && error.message === `internal compiler error in ir-validate: @f: ${message}`
	)
}

const A: IrParam = { id: 0, name: 'a', type: 'i64' }

describe('ir/validate', () => {
	it('should accept a well-formed function', () => {
		const add = fn(
			[
				{
					id: 0,
					insts: [{ kind: 'add', left: 0, op: 'arith', result: 1, right: 0, type: 'i64' }],
					terminator: { op: 'ret', value: 1 },
				},
			],
			[
				[0, 'i64'],
				[1, 'i64'],
			],
			[A]
		)
		assert.doesNotThrow(() => validateFunction(add))
	})

	it('should reject a use of an undefined value', () => {
		rejects(fn([{ id: 0, insts: [], terminator: { op: 'ret', value: 1 } }], [[1, 'i64']]), '%1 is used but never defined')
	})

	it('should reject a jump to a missing block', () => {
		rejects(fn([{ id: 0, insts: [], terminator: { op: 'br', target: 4 } }], []), 'bb0 jumps to missing bb4')
	})

	it('should reject a phi whose operands do not match the predecessors', () => {
		const broken = fn(
			[
				{ id: 0, insts: [], terminator: { op: 'br', target: 1 } },
				{
					id: 1,
					insts: [
						{
							incoming: [
								{ block: 0, value: 0 },
								{ block: 0, value: 0 },
							],
							op: 'phi',
							result: 1,
							type: 'i64',
						},
					],
					terminator: { op: 'ret', value: 1 },
				},
			],
			[
				[0, 'i64'],
				[1, 'i64'],
			],
			[A]
		)
		rejects(broken, 'phi %1 in bb1 does not match predecessors')
	})

	it('should require landing blocks to start with landingpad', () => {
		const broken = fn(
			[
				{
					id: 0,
					insts: [],
					terminator: {
						call: { args: [], callee: { kind: 'direct', name: 'g' }, cleanup: [], effect: 'write', op: 'call', result: null, type: 'void' },
						normal: 1,
						op: 'invoke',
						unwind: 2,
					},
				},
				{ id: 1, insts: [], terminator: { op: 'ret', value: null } },
				{ id: 2, insts: [], terminator: { op: 'ret', value: null } },
			],
			[],
			[],
			'void'
		)
		rejects(broken, 'landing block bb2 does not start with landingpad')
	})

	it('should reject an empty return from a function with a result', () => {
		rejects(fn([{ id: 0, insts: [], terminator: { op: 'ret', value: null } }], []), 'bb0 returns nothing from a i64 function')
	})

	it('should check argument types against the callee', () => {
		const callee = fn([{ id: 0, insts: [], terminator: { op: 'ret', value: 0 } }], [[0, 'i64']], [A])
		const caller: IrFunction = {
			blocks: [
				{
					id: 0,
					insts: [
						{ op: 'const', result: 0, type: 'f64', value: 1.5 },
						{ args: [0], callee: { kind: 'direct', name: 'f' }, cleanup: [], effect: 'write', op: 'call', result: 1, type: 'i64' },
					],
					terminator: { op: 'ret', value: null },
				},
			],
			name: 'main',
			params: [],
			returnType: 'void',
			values: new Map<number, IrType>([
				[0, 'f64'],
				[1, 'i64'],
			]),
		}
		assert.throws(
			() =>
				validateModule({
					classes: [],
					entry: 'main',
					externs: [],
					functions: [callee, caller],
					name: 'm',
					requires: [],
					runtime: { atomicRefCounts: false, gcMode: 'refcount', hashPolicy: 'robin-hood', ssoThreshold: 23 },
					target: 'x86_64-unknown-linux-gnu',
				}),
			/@main: argument 0 of @f: %0 is f64, expected i64/
		)
	})
})
