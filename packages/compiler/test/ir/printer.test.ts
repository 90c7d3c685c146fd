import assert from 'node:assert'
import { describe, it } from 'node:test'
import { formatIrInst, formatIrTerminator } from '../../src/ir/printer.ts'

describe('ir/printer', () => {
	it('should print constants with their type', () => {
		assert.strictEqual(formatIrInst({ op: 'const', result: 0, type: 'f64', value: 1e20 }), '%0: f64 = const 1.0E+20')
		assert.strictEqual(formatIrInst({ op: 'const', result: 1, type: 'str', value: 'a"b' }), '%1: str = const "a\\"b"')
		assert.strictEqual(formatIrInst({ op: 'const', result: 2, type: 'box', value: null }), '%2: box = const null')
	})

	it('should print calls with their cleanup list', () => {
		assert.strictEqual(
			formatIrInst({
				args: [0, 1],
				callee: { kind: 'direct', name: 'rt_concat' },
				cleanup: [2],
				effect: 'none',
				op: 'call',
				result: 3,
				type: 'str',
			}),
			'%3: str = call @rt_concat(%0, %1) cleanup [%2]'
		)
	})

	it('should print reference count operations without a result', () => {
		assert.strictEqual(formatIrInst({ op: 'rc_dec', value: 4 }), 'rc_dec %4')
	})

	it('should print invoke with both successors', () => {
		assert.strictEqual(
			formatIrTerminator({
				call: { args: [0], callee: { kind: 'indirect', value: 5 }, cleanup: [], effect: 'write', op: 'call', result: 6, type: 'i64' },
				normal: 1,
				op: 'invoke',
				unwind: 2,
			}),
			'invoke %6: i64 = call %5(%0) to bb1 unwind bb2'
		)
		assert.strictEqual(formatIrTerminator({ op: 'raise', unwind: 3, value: 0 }), 'raise %0 unwind bb3')
		assert.strictEqual(formatIrTerminator({ op: 'raise', unwind: null, value: 0 }), 'raise %0')
	})
})
