/**
 * Compile-time constant values: literals, parameter and property
 * defaults, class constants and folded constant expressions.
 */

import { arrayOf, BOOL, FLOAT, INT, join, MIXED, NEVER, NULL, type PhpType, STRING } from './types.ts'

export type ConstValue =
	| { readonly kind: 'int'; readonly value: bigint }
	| { readonly kind: 'float'; readonly value: number }
	| { readonly kind: 'bool'; readonly value: boolean }
	| { readonly kind: 'string'; readonly value: string }
	| { readonly kind: 'null' }
	| { readonly kind: 'array'; readonly entries: readonly ConstEntry[] }

export interface ConstEntry {
	readonly key: ConstValue
	readonly value: ConstValue
}

export function intConst(value: bigint): ConstValue {
	return { kind: 'int', value: BigInt.asIntN(64, value) }
}

export function floatConst(value: number): ConstValue {
	return { kind: 'float', value }
}

export function stringConst(value: string): ConstValue {
	return { kind: 'string', value }
}

export function boolConst(value: boolean): ConstValue {
	return { kind: 'bool', value }
}

export const NULL_CONST: ConstValue = { kind: 'null' }

const noClasses = {
	ancestry: (name: string) => [name],
	isSubclassOf: (child: string, ancestor: string) => child.toLowerCase() === ancestor.toLowerCase(),
}

export function constType(value: ConstValue): PhpType {
	switch (value.kind) {
		case 'int':
			return INT
		case 'float':
			return FLOAT
		case 'bool':
			return BOOL
		case 'string':
			return STRING
		case 'null':
			return NULL
		case 'array': {
			let key: PhpType = NEVER
			let element: PhpType = NEVER
			for (const entry of value.entries) {
				key = join(key, constType(entry.key), noClasses)
				element = join(element, constType(entry.value), noClasses)
			}
			return arrayOf(element, key.kind === 'never' && value.entries.length > 0 ? MIXED : key)
		}
	}
}

/**
 * Float to string the way `echo` prints it: 14 significant digits,
 * trailing zeros dropped, exponent form below 1e-4 and from 1e14 up.
 */
export function formatFloat(value: number): string {
	if (Number.isNaN(value)) return 'NAN'
	if (!Number.isFinite(value)) return value > 0 ? 'INF' : '-INF'
	if (value === 0) return Object.is(value, -0) ? '-0' : '0'
	const [mantissa = '0', exponentText = '0'] = value.toExponential(13).split('e')
	const exponent = Number(exponentText)
	if (exponent < -4 || exponent >= 14) {
		const trimmed = mantissa.replace(/\.?0+$/, '')
		const digits = trimmed.includes('.') ? trimmed : `${trimmed}.0`
		return `${digits}E${exponent >= 0 ? '+' : '-'}${Math.abs(exponent)}`
	}
	const text = value.toPrecision(14)
	return text.includes('.') ? text.replace(/\.?0+$/, '') : text
}

/** String conversion of a scalar constant; `null` for arrays. */
export function constToString(value: ConstValue): string | null {
	switch (value.kind) {
		case 'int':
			return value.value.toString()
		case 'float':
			return formatFloat(value.value)
		case 'bool':
			return value.value ? '1' : ''
		case 'string':
			return value.value
		case 'null':
			return ''
		case 'array':
			return null
	}
}

export function formatConst(value: ConstValue): string {
	switch (value.kind) {
		case 'string':
			return JSON.stringify(value.value)
		case 'null':
			return 'null'
		case 'bool':
			return value.value ? 'true' : 'false'
		case 'float': {
			const text = formatFloat(value.value)
			return /^-?\d+$/.test(text) ? `${text}.0` : text
		}
		case 'int':
			return value.value.toString()
		case 'array':
			return `[${value.entries.map((e) => `${formatConst(e.key)} => ${formatConst(e.value)}`).join(', ')}]`
	}
}

export function sameConst(a: ConstValue, b: ConstValue): boolean {
	if (a.kind !== b.kind) return false
	if (a.kind === 'array' && b.kind === 'array') {
		return (
			a.entries.length === b.entries.length &&
			a.entries.every((entry, i) => {
				const other = b.entries[i]
				return other !== undefined && sameConst(entry.key, other.key) && sameConst(entry.value, other.value)
			})
		)
	}
	return formatConst(a) === formatConst(b)
}
