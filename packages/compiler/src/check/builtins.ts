/**
 * Runtime library functions and constants visible to every unit.
 *
 * Polymorphic builtins (`abs`, `max`, ...) list one variant per operand
 * type; the resolver picks the cheapest variant for the argument types.
 */

import {
	ANY_ARRAY,
	arrayOf,
	BOOL,
	type ClassHierarchy,
	FLOAT,
	INT,
	isAssignable,
	MIXED,
	type PhpType,
	settle,
	STRING,
} from './types.ts'
import { type ConstValue, floatConst, intConst, stringConst } from './values.ts'

export interface BuiltinParam {
	readonly type: PhpType
	readonly default?: ConstValue
}

export interface BuiltinVariant {
	readonly params: readonly BuiltinParam[]
	readonly returns: PhpType | ((args: readonly PhpType[]) => PhpType)
	/** Runtime library entry point */
	readonly runtime: string
}

export interface BuiltinFunction {
	readonly name: string
	readonly variants: readonly BuiltinVariant[]
}

function fn(name: string, ...variants: BuiltinVariant[]): [string, BuiltinFunction] {
	return [name, { name, variants }]
}

function required(type: PhpType): BuiltinParam {
	return { type }
}

const intPair = [required(INT), required(INT)]
const floatPair = [required(FLOAT), required(FLOAT)]
const mixedPair = [required(MIXED), required(MIXED)]

export const BUILTIN_FUNCTIONS: ReadonlyMap<string, BuiltinFunction> = new Map([
	fn('strlen', { params: [required(STRING)], returns: INT, runtime: 'rt_strlen' }),
	fn('count', { params: [required(ANY_ARRAY)], returns: INT, runtime: 'rt_count' }),
	fn('implode', { params: [required(STRING), required(ANY_ARRAY)], returns: STRING, runtime: 'rt_implode' }),
	fn('str_repeat', { params: [required(STRING), required(INT)], returns: STRING, runtime: 'rt_str_repeat' }),
	fn('strtoupper', { params: [required(STRING)], returns: STRING, runtime: 'rt_strtoupper' }),
	fn('strtolower', { params: [required(STRING)], returns: STRING, runtime: 'rt_strtolower' }),
	fn(
		'abs',
		{ params: [required(INT)], returns: INT, runtime: 'rt_abs_int' },
		{ params: [required(FLOAT)], returns: FLOAT, runtime: 'rt_abs_float' },
		{ params: [required(MIXED)], returns: MIXED, runtime: 'rt_abs_mixed' }
	),
	fn('intdiv', { params: intPair, returns: INT, runtime: 'rt_intdiv' }),
	fn('sqrt', { params: [required(FLOAT)], returns: FLOAT, runtime: 'rt_sqrt' }),
	fn('floor', { params: [required(FLOAT)], returns: FLOAT, runtime: 'rt_floor' }),
	fn('ceil', { params: [required(FLOAT)], returns: FLOAT, runtime: 'rt_ceil' }),
	fn('cos', { params: [required(FLOAT)], returns: FLOAT, runtime: 'rt_cos' }),
	fn('sin', { params: [required(FLOAT)], returns: FLOAT, runtime: 'rt_sin' }),
	fn('round', {
		params: [required(FLOAT), { default: intConst(0n), type: INT }],
		returns: FLOAT,
		runtime: 'rt_round',
	}),
	fn(
		'max',
		{ params: intPair, returns: INT, runtime: 'rt_max_int' },
		{ params: floatPair, returns: FLOAT, runtime: 'rt_max_float' },
		{ params: mixedPair, returns: MIXED, runtime: 'rt_max_mixed' }
	),
	fn(
		'min',
		{ params: intPair, returns: INT, runtime: 'rt_min_int' },
		{ params: floatPair, returns: FLOAT, runtime: 'rt_min_float' },
		{ params: mixedPair, returns: MIXED, runtime: 'rt_min_mixed' }
	),
	fn('is_null', { params: [required(MIXED)], returns: BOOL, runtime: 'rt_is_null' }),
	fn('array_keys', {
		params: [required(ANY_ARRAY)],
		returns: (args) => {
			const [subject] = args
			return arrayOf(subject?.kind === 'array' ? settle(subject.key) : MIXED, INT)
		},
		runtime: 'rt_array_keys',
	}),
	fn('in_array', { params: [required(MIXED), required(ANY_ARRAY)], returns: BOOL, runtime: 'rt_in_array' }),
	fn('number_format', {
		params: [required(FLOAT), { default: intConst(0n), type: INT }],
		returns: STRING,
		runtime: 'rt_number_format',
	}),
])

export const BUILTIN_CONSTANTS: ReadonlyMap<string, ConstValue> = new Map([
	['PHP_EOL', stringConst('\n')],
	['PHP_INT_MAX', intConst(0x7fffffffffffffffn)],
	['PHP_INT_MIN', intConst(-0x8000000000000000n)],
	['PHP_INT_SIZE', intConst(8n)],
	['M_PI', floatConst(Math.PI)],
])

/**
 * Conversion cost of passing `source` where `target` is expected:
 * 0 for no conversion, 1 for numeric widening, 2 for boxing or unboxing.
 */
function conversionCost(target: PhpType, source: PhpType, classes: ClassHierarchy): number | null {
	if (!isAssignable(target, source, classes)) return null
	if (target.kind === source.kind) return 0
	if (target.kind === 'float' && source.kind === 'int') return 1
	return 2
}

/**
 * Picks the variant of `builtin` accepting `args` with the fewest
 * conversions. Returns `undefined` when no variant fits.
 */
export function selectVariant(
	builtin: BuiltinFunction,
	args: readonly PhpType[],
	classes: ClassHierarchy
): BuiltinVariant | undefined {
	let best: BuiltinVariant | undefined
	let bestCost = Number.POSITIVE_INFINITY
	for (const variant of builtin.variants) {
		const minArgs = variant.params.filter((p) => p.default === undefined).length
		if (args.length < minArgs || args.length > variant.params.length) continue
		let cost = 0
		for (const [i, arg] of args.entries()) {
			const param = variant.params[i]
			const step = param === undefined ? null : conversionCost(param.type, arg, classes)
			if (step === null) {
				cost = Number.POSITIVE_INFINITY
				break
			}
			cost += step
		}
		if (cost < bestCost) {
			best = variant
			bestCost = cost
		}
	}
	return best
}

export function variantReturnType(variant: BuiltinVariant, args: readonly PhpType[]): PhpType {
	return typeof variant.returns === 'function' ? variant.returns(args) : variant.returns
}

/** Argument count range over all variants, for arity diagnostics */
export function builtinArity(builtin: BuiltinFunction): { min: number; max: number } {
	const mins = builtin.variants.map((v) => v.params.filter((p) => p.default === undefined).length)
	const maxes = builtin.variants.map((v) => v.params.length)
	return { max: Math.max(...maxes), min: Math.min(...mins) }
}
