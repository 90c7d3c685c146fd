/**
 * Implicit and explicit conversions between static types.
 */

import type { SourceLocation } from '../core/location.ts'
import { type FunctionState, report } from './state.ts'
import type { TypedExpr } from './typed.ts'
import { ANY_ARRAY, arrayOf, BOOL, INT, isAssignable, MIXED, type PhpType, sameType, STRING, typeToString } from './types.ts'
import { boolConst, type ConstValue, constType } from './values.ts'

export function constant(value: ConstValue, loc: SourceLocation): TypedExpr {
	return { kind: 'Const', loc, type: constType(value), value }
}

function convertNode(expr: TypedExpr, to: PhpType, mode: 'implicit' | 'cast'): TypedExpr {
	return { expr, kind: 'Convert', loc: expr.loc, mode, type: to }
}

/**
 * Evaluate `expr` for its effects and yield `value` instead.
 */
export function discardInto(expr: TypedExpr, value: TypedExpr): TypedExpr {
	return { effects: [expr], kind: 'Seq', loc: expr.loc, result: value, type: value.type }
}

/**
 * Implicit conversion at an assignment, argument or return: numeric
 * widening, boxing into `mixed`, and checked unboxing out of it.
 * Reports KLRES002 naming `context` when the types are incompatible.
 */
export function coerce(expr: TypedExpr, target: PhpType, state: FunctionState, context: string): TypedExpr {
	if (sameType(expr.type, target)) return expr
	if (target.kind === 'void' || expr.type.kind === 'void' || !isAssignable(target, expr.type, state.unit.symbols)) {
		report(state, 'KLRES002', expr.loc, {
			context,
			expected: typeToString(target),
			found: typeToString(expr.type),
		})
		return expr
	}
	if (expr.type.kind === 'never') return { ...expr, type: target }
	return convertNode(expr, target, 'implicit')
}

export function box(expr: TypedExpr, state: FunctionState, context: string): TypedExpr {
	return coerce(expr, MIXED, state, context)
}

/**
 * Explicit `(type)` cast and the implicit string conversion of `echo`,
 * `.` and interpolation. Casts between scalars always succeed.
 */
export function castTo(expr: TypedExpr, target: PhpType, state: FunctionState): TypedExpr {
	const source = expr.type
	if (sameType(source, target)) return expr
	const fail = (operation: string) => {
		report(state, 'KLRES013', expr.loc, { operation, type: typeToString(source) })
		return convertNode(expr, target, 'cast')
	}
	if (source.kind === 'void') {
		report(state, 'KLRES002', expr.loc, { context: 'conversion', expected: typeToString(target), found: 'void' })
		return expr
	}
	switch (target.kind) {
		case 'mixed':
			return convertNode(expr, MIXED, 'implicit')
		case 'array':
			if (source.kind === 'array') return convertNode(expr, target, 'cast')
			if (source.kind === 'mixed') return convertNode(expr, ANY_ARRAY, 'cast')
			if (source.kind === 'null') return discardInto(expr, { items: [], kind: 'ArrayLiteral', loc: expr.loc, type: ANY_ARRAY })
			if (source.kind === 'object') return fail('array cast')
			return {
				items: [{ key: null, value: expr }],
				kind: 'ArrayLiteral',
				loc: expr.loc,
				type: arrayOf(source, INT),
			}
		case 'bool':
			if (source.kind === 'object') return discardInto(expr, constant(boolConst(true), expr.loc))
			return convertNode(expr, BOOL, 'cast')
		case 'int':
		case 'float':
		case 'string':
			if (source.kind === 'array' || source.kind === 'object') {
				return fail(target.kind === 'string' ? 'string conversion' : `${target.kind} conversion`)
			}
			return convertNode(expr, target, 'cast')
		case 'object':
			return coerce(expr, target, state, 'cast')
		default:
			return fail(`${typeToString(target)} conversion`)
	}
}

export function toStringValue(expr: TypedExpr, state: FunctionState): TypedExpr {
	return castTo(expr, STRING, state)
}

export function toCondition(expr: TypedExpr, state: FunctionState): TypedExpr {
	return castTo(expr, BOOL, state)
}
