/**
 * Dynamic value semantics: conversions, comparisons and array keys of
 * boxed payloads, following PHP 8.
 */

import { formatFloat } from '../check/values.ts'
import type { ArrayKey, ArrCell, Cell, Payload, RtValue } from './heap.ts'
import { RuntimeFault } from './heap.ts'

const INT_MIN = -(2n ** 63n)
const INT_MAX = 2n ** 63n - 1n

const NUMERIC = /^[ \t\n\r\v\f]*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?[ \t\n\r\v\f]*$/
const INTEGER = /^[ \t\n\r\v\f]*[+-]?\d+[ \t\n\r\v\f]*$/
const LEADING = /^[ \t\n\r\v\f]*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?/
const CANONICAL_INT = /^(0|-?[1-9]\d*)$/

export type Numeric = { readonly t: 'int'; readonly v: bigint } | { readonly t: 'float'; readonly v: number }

export function wrap(value: bigint): bigint {
	return BigInt.asIntN(64, value)
}

function parseNumber(text: string, integral: boolean): Numeric {
	if (integral) {
		const v = BigInt(text.trim())
		if (v >= INT_MIN && v <= INT_MAX) return { t: 'int', v }
	}
	return { t: 'float', v: Number(text.trim()) }
}

/** Value of a numeric string; `null` when the string is not numeric */
export function numericString(text: string): Numeric | null {
	if (!NUMERIC.test(text)) return null
	return parseNumber(text, INTEGER.test(text))
}

/** Numeric prefix of a string, `0` when there is none */
export function leadingNumber(text: string): Numeric {
	const match = LEADING.exec(text)
	if (match === null) return { t: 'int', v: 0n }
	return parseNumber(match[0], INTEGER.test(match[0]))
}

export function floatToInt(value: number): bigint {
	if (!Number.isFinite(value)) return 0n
	return wrap(BigInt(Math.trunc(value)))
}

export function typeName(payload: Payload): string {
	switch (payload.t) {
		case 'null':
			return 'null'
		case 'int':
			return 'int'
		case 'float':
			return 'float'
		case 'bool':
			return 'bool'
		case 'str':
			return 'string'
		case 'arr':
			return 'array'
		case 'obj':
			return payload.ref.cls.name
	}
}

// ============================================================================
// Conversions
// ============================================================================

export function toBool(payload: Payload): boolean {
	switch (payload.t) {
		case 'null':
			return false
		case 'int':
			return payload.v !== 0n
		case 'float':
			return payload.v !== 0
		case 'bool':
			return payload.v
		case 'str':
			return payload.ref.value !== '' && payload.ref.value !== '0'
		case 'arr':
			return payload.ref.entries.size > 0
		case 'obj':
			return true
	}
}

export function toInt(payload: Payload): bigint {
	switch (payload.t) {
		case 'null':
			return 0n
		case 'int':
			return payload.v
		case 'float':
			return floatToInt(payload.v)
		case 'bool':
			return payload.v ? 1n : 0n
		case 'str': {
			const n = leadingNumber(payload.ref.value)
			return n.t === 'int' ? n.v : floatToInt(n.v)
		}
		case 'arr':
			return payload.ref.entries.size > 0 ? 1n : 0n
		case 'obj':
			return 1n
	}
}

export function toFloat(payload: Payload): number {
	switch (payload.t) {
		case 'float':
			return payload.v
		case 'str':
			return Number(leadingNumber(payload.ref.value).v)
		default:
			return Number(toInt(payload))
	}
}

/** String form; `null` for objects, which have none */
export function toStr(payload: Payload): string | null {
	switch (payload.t) {
		case 'null':
			return ''
		case 'int':
			return payload.v.toString()
		case 'float':
			return formatFloat(payload.v)
		case 'bool':
			return payload.v ? '1' : ''
		case 'str':
			return payload.ref.value
		case 'arr':
			return 'Array'
		case 'obj':
			return null
	}
}

/** Operand of arithmetic; `null` when the operand is not numeric */
export function toNumeric(payload: Payload): Numeric | null {
	switch (payload.t) {
		case 'null':
			return { t: 'int', v: 0n }
		case 'int':
		case 'float':
			return payload
		case 'bool':
			return { t: 'int', v: payload.v ? 1n : 0n }
		case 'str': {
			const text = payload.ref.value
			return LEADING.test(text) ? leadingNumber(text) : null
		}
		default:
			return null
	}
}

/** Normalized array key: integral strings and scalars become integers */
export function arrayKey(payload: Payload): ArrayKey {
	switch (payload.t) {
		case 'null':
			return ''
		case 'int':
			return payload.v
		case 'float':
			return floatToInt(payload.v)
		case 'bool':
			return payload.v ? 1n : 0n
		case 'str': {
			const text = payload.ref.value
			if (CANONICAL_INT.test(text)) {
				const v = BigInt(text)
				if (v >= INT_MIN && v <= INT_MAX) return v
			}
			return text
		}
		default:
			throw new RuntimeFault(`illegal array key of type ${typeName(payload)}`)
	}
}

/** Register value to payload; boxes yield what they hold */
export function payloadOf(value: RtValue): Payload {
	switch (typeof value) {
		case 'bigint':
			return { t: 'int', v: value }
		case 'number':
			return { t: 'float', v: value }
		case 'boolean':
			return { t: 'bool', v: value }
		case 'string':
			throw new RuntimeFault('function reference used as a value')
	}
	return cellPayload(value)
}

export function cellPayload(cell: Cell): Payload {
	switch (cell.kind) {
		case 'str':
			return { ref: cell, t: 'str' }
		case 'arr':
			return { ref: cell, t: 'arr' }
		case 'obj':
			return { ref: cell, t: 'obj' }
		case 'box':
			return cell.value
	}
}

// ============================================================================
// Comparison
// ============================================================================

function sign(n: number | bigint): bigint {
	return n < 0 ? -1n : n > 0 ? 1n : 0n
}

function compareNumbers(a: Numeric, b: Numeric): bigint {
	if (a.t === 'int' && b.t === 'int') return sign(a.v - b.v)
	const x = Number(a.v)
	const y = Number(b.v)
	if (Number.isNaN(x) || Number.isNaN(y)) return 1n
	return x < y ? -1n : x > y ? 1n : 0n
}

export function compareStrings(a: string, b: string): bigint {
	const x = numericString(a)
	const y = numericString(b)
	if (x !== null && y !== null) return compareNumbers(x, y)
	return a < b ? -1n : a > b ? 1n : 0n
}

function compareArrays(a: ArrCell, b: ArrCell): bigint {
	if (a.entries.size !== b.entries.size) return sign(a.entries.size - b.entries.size)
	for (const [id, entry] of a.entries) {
		const other = b.entries.get(id)
		if (other === undefined) return 1n
		const order = compare(entry.value, other.value)
		if (order !== 0n) return order
	}
	return 0n
}

/** `<=>` of two payloads */
export function compare(a: Payload, b: Payload): bigint {
	if (a.t === 'bool' || b.t === 'bool' || (a.t === 'null' && b.t !== 'str') || (b.t === 'null' && a.t !== 'str')) {
		return sign(Number(toBool(a)) - Number(toBool(b)))
	}
	if (a.t === 'null' || b.t === 'null') return compareStrings(toStr(a) ?? '', toStr(b) ?? '')
	if (a.t === 'arr' && b.t === 'arr') return compareArrays(a.ref, b.ref)
	if (a.t === 'arr') return 1n
	if (b.t === 'arr') return -1n
	if (a.t === 'obj' || b.t === 'obj') {
		if (a.t === 'obj' && b.t === 'obj') {
			if (a.ref === b.ref) return 0n
			if (a.ref.cls !== b.ref.cls) return 1n
			for (let i = 0; i < a.ref.slots.length; i++) {
				const x = a.ref.slots[i]
				const y = b.ref.slots[i]
				if (x === undefined || y === undefined) continue
				const order = compare(payloadOf(x), payloadOf(y))
				if (order !== 0n) return order
			}
			return 0n
		}
		return a.t === 'obj' ? 1n : -1n
	}
	if (a.t === 'str' && b.t === 'str') return compareStrings(a.ref.value, b.ref.value)
	if (a.t === 'str' || b.t === 'str') {
		const text = a.t === 'str' ? a.ref.value : b.t === 'str' ? b.ref.value : ''
		const numeric = numericString(text)
		if (numeric === null) return compareStrings(toStr(a) ?? '', toStr(b) ?? '')
		return a.t === 'str' ? compareNumbers(numeric, toNumericOrZero(b)) : compareNumbers(toNumericOrZero(a), numeric)
	}
	return compareNumbers(toNumericOrZero(a), toNumericOrZero(b))
}

function toNumericOrZero(payload: Payload): Numeric {
	return toNumeric(payload) ?? { t: 'int', v: 0n }
}

export function looseEquals(a: Payload, b: Payload): boolean {
	if (a.t === 'obj' && b.t === 'obj' && a.ref.cls !== b.ref.cls) return false
	if (a.t === 'arr' && b.t === 'arr') {
		if (a.ref.entries.size !== b.ref.entries.size) return false
		for (const [id, entry] of a.ref.entries) {
			const other = b.ref.entries.get(id)
			if (other === undefined || !looseEquals(entry.value, other.value)) return false
		}
		return true
	}
	if ((a.t === 'arr') !== (b.t === 'arr') && a.t !== 'null' && b.t !== 'null' && a.t !== 'bool' && b.t !== 'bool') {
		return false
	}
	if (a.t === 'str' && b.t === 'str' && (numericString(a.ref.value) === null || numericString(b.ref.value) === null)) {
		return a.ref.value === b.ref.value
	}
	return compare(a, b) === 0n
}

export function identical(a: Payload, b: Payload): boolean {
	switch (a.t) {
		case 'null':
			return b.t === 'null'
		case 'int':
		case 'float':
		case 'bool':
			return b.t === a.t && b.v === a.v
		case 'str':
			return b.t === 'str' && b.ref.value === a.ref.value
		case 'obj':
			return b.t === 'obj' && b.ref === a.ref
		case 'arr': {
			if (b.t !== 'arr' || a.ref.entries.size !== b.ref.entries.size) return false
			const left = [...a.ref.entries]
			const right = [...b.ref.entries]
			return left.every(([id, entry], i) => {
				const other = right[i]
				return other !== undefined && other[0] === id && identical(entry.value, other[1].value)
			})
		}
	}
}

/** Text of a value in an error message */
export function debugRepr(payload: Payload): string {
	switch (payload.t) {
		case 'null':
			return 'NULL'
		case 'bool':
			return payload.v ? 'true' : 'false'
		case 'int':
		case 'float':
			return toStr(payload) ?? ''
		case 'str':
			return `'${payload.ref.value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`
		case 'arr':
			return 'of type array'
		case 'obj':
			return `of type ${payload.ref.cls.name}`
	}
}
