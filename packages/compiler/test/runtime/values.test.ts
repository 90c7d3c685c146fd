import assert from 'node:assert'
import { describe, it } from 'node:test'
import { formatFloat } from '../../src/check/values.ts'
import { Heap, type Payload } from '../../src/runtime/heap.ts'
import { numberFormat, roundHalfAway } from '../../src/runtime/library.ts'
import {
	arrayKey,
	compare,
	identical,
	leadingNumber,
	looseEquals,
	numericString,
	toBool,
	toInt,
	toStr,
	wrap,
} from '../../src/runtime/values.ts'

const heap = new Heap()

function str(value: string): Payload {
	return { ref: heap.str(value), t: 'str' }
}

function int(v: bigint): Payload {
	return { t: 'int', v }
}

describe('runtime/values', () => {
	describe('integers', () => {
		it('should wrap to 64 bits', () => {
			assert.strictEqual(wrap(2n ** 63n), -(2n ** 63n))
			assert.strictEqual(wrap(-(2n ** 63n) - 1n), 2n ** 63n - 1n)
		})
	})

	describe('numeric strings', () => {
		it('should accept surrounding whitespace and exponents', () => {
			assert.deepStrictEqual(numericString(' 42 '), { t: 'int', v: 42n })
			assert.deepStrictEqual(numericString('1e3'), { t: 'float', v: 1000 })
			assert.strictEqual(numericString('12abc'), null)
		})

		it('should take the leading number of a non-numeric string', () => {
			assert.deepStrictEqual(leadingNumber('12abc'), { t: 'int', v: 12n })
			assert.deepStrictEqual(leadingNumber('abc'), { t: 'int', v: 0n })
		})
	})

	describe('conversions', () => {
		it('should treat "0" and the empty string as false', () => {
			assert.strictEqual(toBool(str('0')), false)
			assert.strictEqual(toBool(str('')), false)
			assert.strictEqual(toBool(str('0.0')), true)
		})

		it('should truncate floats toward zero', () => {
			assert.strictEqual(toInt({ t: 'float', v: -3.9 }), -3n)
			assert.strictEqual(toInt(str('7 apples')), 7n)
		})

		it('should print floats the way echo does', () => {
			assert.strictEqual(toStr({ t: 'float', v: 2.5 }), '2.5')
			assert.strictEqual(toStr({ t: 'float', v: 3 }), '3')
			assert.strictEqual(toStr({ t: 'bool', v: false }), '')
			assert.strictEqual(formatFloat(0.1 + 0.2), '0.3')
			assert.strictEqual(formatFloat(1e20), '1.0E+20')
		})
	})

	describe('array keys', () => {
		it('should turn canonical integer strings into integers', () => {
			assert.strictEqual(arrayKey(str('10')), 10n)
			assert.strictEqual(arrayKey(str('010')), '010')
			assert.strictEqual(arrayKey({ t: 'bool', v: true }), 1n)
			assert.strictEqual(arrayKey({ t: 'null' }), '')
		})
	})

	describe('comparison', () => {
		it('should compare numeric strings as numbers', () => {
			assert.strictEqual(compare(str('10'), str('9')), 1n)
			assert.strictEqual(compare(str('abc'), str('abd')), -1n)
		})

		it('should compare a number with a non-numeric string as strings', () => {
			assert.strictEqual(looseEquals(int(0n), str('a')), false)
			assert.strictEqual(looseEquals(int(1n), str('1')), true)
		})

		it('should require the same type for identity', () => {
			assert.strictEqual(identical(int(1n), { t: 'float', v: 1 }), false)
			assert.strictEqual(identical(str('x'), str('x')), true)
		})
	})

	describe('number formatting', () => {
		it('should round half away from zero', () => {
			assert.strictEqual(roundHalfAway(2.5, 0), 3)
			assert.strictEqual(roundHalfAway(-2.5, 0), -3)
			assert.strictEqual(roundHalfAway(1.005, 2), 1.01)
		})

		it('should group thousands', () => {
			assert.strictEqual(numberFormat(1234567.891, 2), '1,234,567.89')
			assert.strictEqual(numberFormat(-0.001, 2), '0.00')
			assert.strictEqual(numberFormat(999.5, 0), '1,000')
		})
	})
})
