/**
 * Operator typing.
 *
 * Each binary operator picks an operand type, converts both operands to
 * it, and records it on the node. Lowering selects the machine operation
 * or runtime call from that operand type alone.
 */

import type { BinaryOperator } from '../core/ast.ts'
import type { SourceLocation } from '../core/location.ts'
import { box, castTo, constant, coerce, toStringValue } from './conversions.ts'
import { type FunctionState, report } from './state.ts'
import type { TypedBinaryOp, TypedExpr } from './typed.ts'
import { BOOL, FLOAT, INT, isNumeric, join, MIXED, type PhpType, STRING, typeToString } from './types.ts'
import { boolConst } from './values.ts'

const ARITHMETIC: Partial<Record<BinaryOperator, TypedBinaryOp>> = {
	'*': 'mul',
	'**': 'pow',
	'+': 'add',
	'-': 'sub',
	'/': 'div',
}

const BITWISE: Partial<Record<BinaryOperator, TypedBinaryOp>> = {
	'%': 'mod',
	'&': 'bitAnd',
	'<<': 'shl',
	'>>': 'shr',
	'^': 'bitXor',
	'|': 'bitOr',
}

const ORDERING: Partial<Record<BinaryOperator, TypedBinaryOp>> = {
	'<': 'lt',
	'<=': 'le',
	'<=>': 'cmp',
	'>': 'gt',
	'>=': 'ge',
}

/** Types compared by value without a runtime call */
const DIRECT_EQUALITY = new Set(['int', 'float', 'bool', 'string'])

function node(
	op: TypedBinaryOp,
	operandType: PhpType,
	left: TypedExpr,
	right: TypedExpr,
	type: PhpType,
	loc: SourceLocation
): TypedExpr {
	return { kind: 'Binary', left, loc, op, operandType, right, type }
}

function invalid(state: FunctionState, op: string, type: PhpType, loc: SourceLocation): void {
	report(state, 'KLRES013', loc, { operation: `\`${op}\``, type: typeToString(type) })
}

function isScalarOrMixed(type: PhpType): boolean {
	return type.kind !== 'array' && type.kind !== 'object' && type.kind !== 'void'
}

function arithmetic(
	op: BinaryOperator,
	typed: TypedBinaryOp,
	left: TypedExpr,
	right: TypedExpr,
	loc: SourceLocation,
	state: FunctionState
): TypedExpr {
	if (op === '+' && left.type.kind === 'array' && right.type.kind === 'array') {
		return {
			args: [left, right],
			kind: 'Builtin',
			loc,
			name: 'array union',
			runtime: 'rt_array_union',
			type: join(left.type, right.type, state.unit.symbols),
		}
	}
	if (left.type.kind === 'int' && right.type.kind === 'int') return node(typed, INT, left, right, INT, loc)
	if (isNumeric(left.type) && isNumeric(right.type)) {
		const l = coerce(left, FLOAT, state, `\`${op}\``)
		const r = coerce(right, FLOAT, state, `\`${op}\``)
		return node(typed, FLOAT, l, r, FLOAT, loc)
	}
	for (const operand of [left, right]) {
		if (!isScalarOrMixed(operand.type)) invalid(state, op, operand.type, operand.loc)
	}
	const context = `\`${op}\``
	return node(typed, MIXED, box(left, state, context), box(right, state, context), MIXED, loc)
}

function integer(
	op: BinaryOperator,
	typed: TypedBinaryOp,
	left: TypedExpr,
	right: TypedExpr,
	loc: SourceLocation,
	state: FunctionState
): TypedExpr {
	for (const operand of [left, right]) {
		if (!isScalarOrMixed(operand.type)) invalid(state, op, operand.type, operand.loc)
	}
	return node(typed, INT, castTo(left, INT, state), castTo(right, INT, state), INT, loc)
}

function ordering(
	typed: TypedBinaryOp,
	left: TypedExpr,
	right: TypedExpr,
	loc: SourceLocation,
	state: FunctionState
): TypedExpr {
	const result = typed === 'cmp' ? INT : BOOL
	const [lk, rk] = [left.type.kind, right.type.kind]
	if (lk === 'int' && rk === 'int') return node(typed, INT, left, right, result, loc)
	if (isNumeric(left.type) && isNumeric(right.type)) {
		return node(typed, FLOAT, coerce(left, FLOAT, state, 'comparison'), coerce(right, FLOAT, state, 'comparison'), result, loc)
	}
	if (lk === 'string' && rk === 'string') return node(typed, STRING, left, right, result, loc)
	return node(typed, MIXED, box(left, state, 'comparison'), box(right, state, 'comparison'), result, loc)
}

/** `==` and `!=`: PHP 8 loose comparison */
function looseEquality(
	typed: TypedBinaryOp,
	left: TypedExpr,
	right: TypedExpr,
	loc: SourceLocation,
	state: FunctionState
): TypedExpr {
	const [lk, rk] = [left.type.kind, right.type.kind]
	if (lk === rk && DIRECT_EQUALITY.has(lk)) return node(typed, left.type, left, right, BOOL, loc)
	if (isNumeric(left.type) && isNumeric(right.type)) {
		return node(typed, FLOAT, coerce(left, FLOAT, state, 'comparison'), coerce(right, FLOAT, state, 'comparison'), BOOL, loc)
	}
	return node(typed, MIXED, box(left, state, 'comparison'), box(right, state, 'comparison'), BOOL, loc)
}

/** `===` and `!==`: equal type and value, or the same object */
function identity(
	typed: TypedBinaryOp,
	left: TypedExpr,
	right: TypedExpr,
	loc: SourceLocation,
	state: FunctionState
): TypedExpr {
	const [lk, rk] = [left.type.kind, right.type.kind]
	if (lk === rk && DIRECT_EQUALITY.has(lk)) return node(typed, left.type, left, right, BOOL, loc)
	if (lk === 'object' && rk === 'object') return node(typed, left.type, left, right, BOOL, loc)
	const dynamic = (kind: string) => kind === 'mixed' || kind === 'null' || kind === 'array' || kind === 'object'
	if (!dynamic(lk) && !dynamic(rk) && lk !== rk) {
		const verdict = constant(boolConst(typed === 'notIdentical'), loc)
		return { effects: [left, right], kind: 'Seq', loc, result: verdict, type: BOOL }
	}
	return node(typed, MIXED, box(left, state, 'comparison'), box(right, state, 'comparison'), BOOL, loc)
}

/**
 * Type a binary operator other than `&&`, `||` and `??`, which have their
 * own evaluation order.
 */
export function checkBinaryOperator(
	op: BinaryOperator,
	left: TypedExpr,
	right: TypedExpr,
	loc: SourceLocation,
	state: FunctionState
): TypedExpr {
	const arith = ARITHMETIC[op]
	if (arith !== undefined) return arithmetic(op, arith, left, right, loc, state)
	const bitwise = BITWISE[op]
	if (bitwise !== undefined) return integer(op, bitwise, left, right, loc, state)
	const order = ORDERING[op]
	if (order !== undefined) return ordering(order, left, right, loc, state)
	switch (op) {
		case '.':
			return node('concat', STRING, toStringValue(left, state), toStringValue(right, state), STRING, loc)
		case '==':
			return looseEquality('eq', left, right, loc, state)
		case '!=':
			return looseEquality('ne', left, right, loc, state)
		case '===':
			return identity('identical', left, right, loc, state)
		case '!==':
			return identity('notIdentical', left, right, loc, state)
		default:
			invalid(state, op, left.type, loc)
			return left
	}
}

/** Compound assignment operator to its binary operator (`+=` to `+`) */
export function compoundOperator(op: string): BinaryOperator | null {
	return toBinaryOperator(op.slice(0, -1))
}

function toBinaryOperator(op: string): BinaryOperator | null {
	switch (op) {
		case '+':
		case '-':
		case '*':
		case '/':
		case '.':
		case '%':
		case '**':
		case '|':
		case '&':
		case '^':
		case '<<':
		case '>>':
			return op
		default:
			return null
	}
}
