/**
 * Expression checking.
 *
 * Turns syntax-tree expressions into typed expressions: names resolved,
 * operand conversions explicit, and values read more than once held in
 * temporaries.
 */

import type {
	ArrayLiteral,
	Binary,
	CastType,
	Empty,
	Expr,
	InterpolatedString,
	Isset,
	Match,
	Ternary,
	Unary,
	Variable,
} from '../core/ast.ts'
import type { SourceLocation } from '../core/location.ts'
import { BUILTIN_CONSTANTS } from './builtins.ts'
import { checkCall, checkMethodCall, checkNew, checkStaticCall } from './calls.ts'
import { box, castTo, coerce, constant, discardInto, toCondition, toStringValue } from './conversions.ts'
import { resolveClassName } from './declarations.ts'
import { checkAssign, checkIncDec } from './lvalues.ts'
import { declScope, lookupConstant, lookupProperty } from './members.ts'
import { checkBinaryOperator } from './operators.ts'
import { type FunctionState, freshTemp, localType, report } from './state.ts'
import type { TArrayItem, TMatchArm, TypedExpr } from './typed.ts'
import {
	ANY_ARRAY,
	arrayOf,
	BOOL,
	FLOAT,
	INT,
	join,
	MIXED,
	NEVER,
	objectOf,
	type PhpType,
	settle,
	STRING,
	typeToString,
} from './types.ts'
import { boolConst, floatConst, intConst, NULL_CONST, stringConst } from './values.ts'

// ============================================================================
// Helpers
// ============================================================================

export function local(name: string, type: PhpType, loc: SourceLocation): TypedExpr {
	return { kind: 'Local', loc, name, type }
}

export function assignTemp(name: string, value: TypedExpr): TypedExpr {
	return {
		kind: 'Assign',
		loc: value.loc,
		target: { kind: 'Local', loc: value.loc, name, type: value.type },
		type: value.type,
		value,
	}
}

/**
 * Make `expr` safe to evaluate twice: locals and constants are returned
 * as they are, anything else is assigned to a temporary first.
 */
export function stable(expr: TypedExpr, state: FunctionState, effects: TypedExpr[]): TypedExpr {
	if (expr.kind === 'Local' || expr.kind === 'Const') return expr
	const name = freshTemp(state, expr.type)
	effects.push(assignTemp(name, expr))
	return local(name, expr.type, expr.loc)
}

export function sequence(effects: readonly TypedExpr[], result: TypedExpr): TypedExpr {
	if (effects.length === 0) return result
	return { effects, kind: 'Seq', loc: result.loc, result, type: result.type }
}

/** Values that may be null at run time */
export function isNullable(type: PhpType): boolean {
	return type.kind === 'mixed' || type.kind === 'null' || type.kind === 'never'
}

/**
 * Join the types of alternative results and convert each to the join.
 */
export function joinBranches(values: readonly TypedExpr[], state: FunctionState): { type: PhpType; values: TypedExpr[] } {
	let type: PhpType = NEVER
	for (const value of values) type = join(type, value.type, state.unit.symbols)
	if (!state.inferring) type = settle(type)
	return { type, values: values.map((value) => coerce(value, type, state, 'conditional expression')) }
}

function ternary(cond: TypedExpr, then: TypedExpr, otherwise: TypedExpr, loc: SourceLocation, state: FunctionState): TypedExpr {
	const { type, values } = joinBranches([then, otherwise], state)
	const [a = then, b = otherwise] = values
	return { cond, else: b, kind: 'Ternary', loc, then: a, type }
}

function nullConstant(loc: SourceLocation, type: PhpType = MIXED): TypedExpr {
	return { kind: 'Const', loc, type, value: NULL_CONST }
}

export function thisExpr(state: FunctionState, loc: SourceLocation): TypedExpr {
	if (!state.hasThis || state.classScope === null) {
		report(state, 'KLRES001', loc, { name: '$this', what: 'variable' })
		return local('this', MIXED, loc)
	}
	return local('this', objectOf(state.classScope), loc)
}

// ============================================================================
// Names
// ============================================================================

function checkVariable(expr: Variable, state: FunctionState): TypedExpr {
	if (expr.name === 'this') return thisExpr(state, expr.loc)
	const type = localType(state, expr.name)
	if (type === undefined) {
		report(state, 'KLRES001', expr.loc, { name: `$${expr.name}`, what: 'variable' })
		return local(expr.name, NEVER, expr.loc)
	}
	return local(expr.name, type, expr.loc)
}

function checkClassConstant(className: string, name: string, loc: SourceLocation, state: FunctionState): TypedExpr {
	const resolved = resolveClassName(className, declScope(state), loc)
	if (resolved === null) return nullConstant(loc)
	if (name === 'class') return constant(stringConst(resolved), loc)
	const symbol = lookupConstant(state, resolved, name, loc)
	return symbol === null ? nullConstant(loc) : constant(symbol.value, loc)
}

// ============================================================================
// Strings and Arrays
// ============================================================================

function checkInterpolation(expr: InterpolatedString, state: FunctionState): TypedExpr {
	let result: TypedExpr | null = null
	for (const part of expr.parts) {
		const piece = typeof part === 'string' ? constant(stringConst(part), expr.loc) : toStringValue(checkExpr(part, state), state)
		result =
			result === null
				? piece
				: { kind: 'Binary', left: result, loc: expr.loc, op: 'concat', operandType: STRING, right: piece, type: STRING }
	}
	return result ?? constant(stringConst(''), expr.loc)
}

/**
 * Static type of the key an array stores for `key`, after the runtime's
 * key normalization.
 */
export function keyTypeOf(key: TypedExpr, state: FunctionState): PhpType {
	switch (key.type.kind) {
		case 'int':
		case 'bool':
		case 'float':
			return INT
		case 'string':
			if (key.kind === 'Const' && key.value.kind === 'string' && /^(0|-?[1-9][0-9]*)$/.test(key.value.value)) return INT
			return STRING
		case 'null':
			return STRING
		case 'mixed':
			return MIXED
		case 'never':
			return NEVER
		default:
			report(state, 'KLRES013', key.loc, { operation: 'array key', type: typeToString(key.type) })
			return MIXED
	}
}

function checkArrayLiteral(expr: ArrayLiteral, state: FunctionState): TypedExpr {
	const items = expr.items.map((item) => ({
		key: item.key === null ? null : checkExpr(item.key, state),
		value: checkExpr(item.value, state),
	}))
	let key: PhpType = NEVER
	for (const item of items) key = join(key, item.key === null ? INT : keyTypeOf(item.key, state), state.unit.symbols)
	const { type: element, values } = joinBranches(
		items.map((item) => item.value),
		state
	)
	const typedItems: TArrayItem[] = items.map((item, i) => ({ key: item.key, value: values[i] ?? item.value }))
	const type = arrayOf(items.length === 0 ? NEVER : element, state.inferring || items.length === 0 ? key : settle(key))
	return { items: typedItems, kind: 'ArrayLiteral', loc: expr.loc, type }
}

/**
 * Read `array[key]` at the element type. A missing key reads as the
 * element type's zero value. Compound assignments and guarded reads use
 * this directly; plain reads widen it to `mixed` in `checkIndex`.
 * Strings index by byte offset; `mixed` goes through the runtime.
 */
export function indexRead(array: TypedExpr, key: TypedExpr, loc: SourceLocation, state: FunctionState): TypedExpr {
	const type = array.type
	switch (type.kind) {
		case 'array':
			keyTypeOf(key, state)
			return { array, arrayType: type, key, kind: 'Index', loc, type: state.inferring ? type.element : settle(type.element) }
		case 'never':
			return { array, arrayType: ANY_ARRAY, key, kind: 'Index', loc, type: NEVER }
		case 'mixed':
		case 'null':
			keyTypeOf(key, state)
			return {
				args: [box(array, state, 'array access'), box(key, state, 'array key')],
				kind: 'Builtin',
				loc,
				name: 'index',
				runtime: 'rt_mixed_index',
				type: MIXED,
			}
		case 'string':
			return {
				args: [array, castTo(key, INT, state)],
				kind: 'Builtin',
				loc,
				name: 'string offset',
				runtime: 'rt_str_offset',
				type: STRING,
			}
		default:
			report(state, 'KLRES013', loc, { operation: 'array access', type: typeToString(type) })
			return nullConstant(loc)
	}
}

function checkIndex(array: Expr, index: Expr | null, loc: SourceLocation, state: FunctionState): TypedExpr {
	const base = checkExpr(array, state)
	if (index === null) {
		report(state, 'KLRES013', loc, { operation: 'reading `[]`', type: typeToString(base.type) })
		return nullConstant(loc)
	}
	const read = indexRead(base, checkExpr(index, state), loc, state)
	// a missing key reads as null, so the element comes back boxed
	return read.kind === 'Index' && !isNullable(read.type) ? { ...read, type: MIXED } : read
}

// ============================================================================
// Objects
// ============================================================================

export function propertyRead(object: TypedExpr, name: string, loc: SourceLocation, state: FunctionState): TypedExpr {
	const type = object.type
	switch (type.kind) {
		case 'object': {
			const property = lookupProperty(state, type.className, name, loc)
			if (property === null) return nullConstant(loc)
			return {
				className: type.className,
				kind: 'PropGet',
				loc,
				name,
				object,
				slot: property.slot,
				type: property.type,
			}
		}
		case 'mixed':
		case 'null':
		case 'never':
			return {
				kind: 'DynPropGet',
				loc,
				name,
				object: box(object, state, 'property access'),
				type: type.kind === 'never' ? NEVER : MIXED,
			}
		default:
			report(state, 'KLRES013', loc, { operation: 'property access', type: typeToString(type) })
			return nullConstant(loc)
	}
}

function checkInstanceOf(expr: Expr, className: string, loc: SourceLocation, state: FunctionState): TypedExpr {
	const value = checkExpr(expr, state)
	const resolved = resolveClassName(className, declScope(state), loc)
	if (resolved === null) return discardInto(value, constant(boolConst(false), loc))
	if (value.type.kind === 'object' || value.type.kind === 'mixed') {
		return { className: resolved, expr: value, kind: 'InstanceOf', loc, type: BOOL }
	}
	return discardInto(value, constant(boolConst(false), loc))
}

// ============================================================================
// Operators
// ============================================================================

function checkCoalesce(expr: Binary, state: FunctionState): TypedExpr {
	const { left, loc } = expr
	if (left.kind === 'Variable' && left.name !== 'this') {
		const type = localType(state, left.name)
		if (type === undefined) return checkExpr(expr.right, state)
		const value = local(left.name, type, left.loc)
		if (!isNullable(type)) return value
		const test: TypedExpr = { expr: value, kind: 'IsNotNull', loc, type: BOOL }
		return ternary(test, value, checkExpr(expr.right, state), loc, state)
	}
	const effects: TypedExpr[] = []
	let value: TypedExpr
	if (left.kind === 'Index' && left.index !== null) {
		const array = checkExpr(left.array, state)
		const key = checkExpr(left.index, state)
		if (array.type.kind === 'array') {
			const arrayRead = stable(array, state, effects)
			const keyRead = stable(key, state, effects)
			const test: TypedExpr = { array: arrayRead, arrayType: array.type, key: keyRead, kind: 'IssetIndex', loc, type: BOOL }
			const found = indexRead(arrayRead, keyRead, left.loc, state)
			return sequence(effects, ternary(test, found, checkExpr(expr.right, state), loc, state))
		}
		value = indexRead(array, key, left.loc, state)
	} else {
		value = checkExpr(left, state)
	}
	if (!isNullable(value.type)) return value
	const held = stable(value, state, effects)
	const test: TypedExpr = { expr: held, kind: 'IsNotNull', loc, type: BOOL }
	return sequence(effects, ternary(test, held, checkExpr(expr.right, state), loc, state))
}

function checkBinary(expr: Binary, state: FunctionState): TypedExpr {
	switch (expr.op) {
		case '&&':
		case '||':
			return {
				kind: 'Logical',
				left: toCondition(checkExpr(expr.left, state), state),
				loc: expr.loc,
				op: expr.op === '&&' ? 'and' : 'or',
				right: toCondition(checkExpr(expr.right, state), state),
				type: BOOL,
			}
		case '??':
			return checkCoalesce(expr, state)
		default: {
			const left = checkExpr(expr.left, state)
			const right = checkExpr(expr.right, state)
			if (left.type.kind === 'never' || right.type.kind === 'never') {
				return { kind: 'Binary', left, loc: expr.loc, op: 'add', operandType: NEVER, right, type: NEVER }
			}
			return checkBinaryOperator(expr.op, left, right, expr.loc, state)
		}
	}
}

function checkUnary(expr: Unary, state: FunctionState): TypedExpr {
	const operand = checkExpr(expr.operand, state)
	const { loc } = expr
	switch (expr.op) {
		case '!':
			return { kind: 'Unary', loc, op: 'not', operand: toCondition(operand, state), type: BOOL }
		case '~':
			return { kind: 'Unary', loc, op: 'bitNot', operand: castTo(operand, INT, state), type: INT }
		case '-':
			if (operand.type.kind === 'int' || operand.type.kind === 'float' || operand.type.kind === 'never') {
				return { kind: 'Unary', loc, op: 'neg', operand, type: operand.type }
			}
			return checkBinaryOperator('*', operand, constant(intConst(-1n), loc), loc, state)
		case '+':
			if (operand.type.kind === 'int' || operand.type.kind === 'float' || operand.type.kind === 'never') return operand
			return checkBinaryOperator('+', constant(intConst(0n), loc), operand, loc, state)
	}
}

const CAST_TARGETS: Record<CastType, PhpType> = {
	array: ANY_ARRAY,
	bool: BOOL,
	float: FLOAT,
	int: INT,
	string: STRING,
}

// ============================================================================
// Conditionals
// ============================================================================

function checkTernary(expr: Ternary, state: FunctionState): TypedExpr {
	const otherwise = () => checkExpr(expr.else, state)
	if (expr.then === null) {
		const effects: TypedExpr[] = []
		const held = stable(checkExpr(expr.cond, state), state, effects)
		return sequence(effects, ternary(toCondition(held, state), held, otherwise(), expr.loc, state))
	}
	const cond = toCondition(checkExpr(expr.cond, state), state)
	return ternary(cond, checkExpr(expr.then, state), otherwise(), expr.loc, state)
}

function coversBool(subject: PhpType, arms: Match['arms']): boolean {
	if (subject.kind !== 'bool') return false
	const literals = arms.flatMap((arm) => arm.conditions ?? []).filter((c) => c.kind === 'BoolLiteral')
	return literals.some((c) => c.value) && literals.some((c) => !c.value)
}

/**
 * `match`: identity tests in arm order, `default` last. Without a default
 * the arms must cover the subject's values or a runtime failure is built.
 */
function checkMatch(expr: Match, state: FunctionState): TypedExpr {
	const subject = checkExpr(expr.subject, state)
	const effects: TypedExpr[] = []
	const held = stable(subject, state, effects)
	const arms = expr.arms.map((arm) => ({
		body: checkExpr(arm.body, state),
		tests:
			arm.conditions?.map((condition) =>
				checkBinaryOperator('===', held, checkExpr(condition, state), condition.loc, state)
			) ?? null,
	}))
	const ordered = [...arms.filter((arm) => arm.tests !== null), ...arms.filter((arm) => arm.tests === null)]
	const { type, values } = joinBranches(
		ordered.map((arm) => arm.body),
		state
	)
	const typedArms: TMatchArm[] = ordered.map((arm, i) => ({ body: values[i] ?? arm.body, tests: arm.tests }))
	const exhaustive = typedArms.some((arm) => arm.tests === null) || coversBool(subject.type, expr.arms)
	return sequence(effects, { arms: typedArms, exhaustive, kind: 'Match', loc: expr.loc, subject: held, type })
}

// ============================================================================
// isset and empty
// ============================================================================

interface IssetParts {
	readonly effects: TypedExpr[]
	readonly test: TypedExpr
	/** The tested value, for `empty` */
	readonly read: TypedExpr | null
}

function issetParts(target: Expr, state: FunctionState): IssetParts {
	const effects: TypedExpr[] = []
	const { loc } = target
	const always = (value: boolean, read: TypedExpr | null): IssetParts => ({
		effects,
		read,
		test: constant(boolConst(value), loc),
	})
	switch (target.kind) {
		case 'Variable': {
			if (target.name === 'this') return always(state.hasThis, state.hasThis ? thisExpr(state, loc) : null)
			const type = localType(state, target.name)
			if (type === undefined) return always(false, null)
			const value = local(target.name, type, loc)
			if (!isNullable(type)) return always(true, value)
			return { effects, read: value, test: { expr: value, kind: 'IsNotNull', loc, type: BOOL } }
		}
		case 'Index': {
			const array = checkExpr(target.array, state)
			if (target.index === null) {
				report(state, 'KLRES013', loc, { operation: 'isset on `[]`', type: typeToString(array.type) })
				return always(false, null)
			}
			const key = checkExpr(target.index, state)
			const arrayRead = stable(array, state, effects)
			const keyRead = stable(key, state, effects)
			if (array.type.kind === 'array') {
				return {
					effects,
					read: indexRead(arrayRead, keyRead, loc, state),
					test: { array: arrayRead, arrayType: array.type, key: keyRead, kind: 'IssetIndex', loc, type: BOOL },
				}
			}
			const runtime = array.type.kind === 'string' ? 'rt_str_isset_offset' : 'rt_mixed_isset_index'
			const args =
				array.type.kind === 'string'
					? [arrayRead, castTo(keyRead, INT, state)]
					: [box(arrayRead, state, 'isset'), box(keyRead, state, 'isset')]
			return {
				effects,
				read: indexRead(arrayRead, keyRead, loc, state),
				test: { args, kind: 'Builtin', loc, name: 'isset', runtime, type: BOOL },
			}
		}
		case 'PropertyFetch': {
			const object = stable(checkExpr(target.object, state), state, effects)
			if (isNullable(object.type)) {
				const present: TypedExpr = {
					args: [box(object, state, 'isset'), constant(stringConst(target.name), loc)],
					kind: 'Builtin',
					loc,
					name: 'isset',
					runtime: 'rt_dyn_prop_isset',
					type: BOOL,
				}
				return { effects, read: propertyRead(object, target.name, loc, state), test: present }
			}
			const value = propertyRead(object, target.name, loc, state)
			if (!isNullable(value.type)) return always(true, value)
			const held = stable(value, state, effects)
			return { effects, read: held, test: { expr: held, kind: 'IsNotNull', loc, type: BOOL } }
		}
		default:
			report(state, 'KLRES013', loc, { operation: 'isset', type: 'an expression result' })
			return always(false, null)
	}
}

function checkIsset(expr: Isset, state: FunctionState): TypedExpr {
	const parts = expr.targets.map((target) => issetParts(target, state))
	let result: TypedExpr | null = null
	for (const part of parts) {
		const test = sequence(part.effects, part.test)
		result = result === null ? test : { kind: 'Logical', left: result, loc: expr.loc, op: 'and', right: test, type: BOOL }
	}
	return result ?? constant(boolConst(false), expr.loc)
}

function checkEmpty(expr: Empty, state: FunctionState): TypedExpr {
	const { loc } = expr
	const target = expr.expr
	let present: TypedExpr
	if (target.kind === 'Variable' || target.kind === 'Index' || target.kind === 'PropertyFetch') {
		const parts = issetParts(target, state)
		const truthy = parts.read === null ? constant(boolConst(false), loc) : toCondition(parts.read, state)
		const test: TypedExpr =
			parts.test.kind === 'Const' ? truthy : { kind: 'Logical', left: parts.test, loc, op: 'and', right: truthy, type: BOOL }
		present = sequence(parts.effects, test)
	} else {
		present = toCondition(checkExpr(target, state), state)
	}
	return { kind: 'Unary', loc, op: 'not', operand: present, type: BOOL }
}

// ============================================================================
// Dispatch
// ============================================================================

export function checkExpr(expr: Expr, state: FunctionState): TypedExpr {
	switch (expr.kind) {
		case 'IntLiteral':
			return constant(intConst(expr.value), expr.loc)
		case 'FloatLiteral':
			return constant(floatConst(expr.value), expr.loc)
		case 'StringLiteral':
			return constant(stringConst(expr.value), expr.loc)
		case 'BoolLiteral':
			return constant(boolConst(expr.value), expr.loc)
		case 'NullLiteral':
			return constant(NULL_CONST, expr.loc)
		case 'InterpolatedString':
			return checkInterpolation(expr, state)
		case 'ArrayLiteral':
			return checkArrayLiteral(expr, state)
		case 'Variable':
			return checkVariable(expr, state)
		case 'ConstFetch': {
			const value = BUILTIN_CONSTANTS.get(expr.name)
			if (value === undefined) {
				report(state, 'KLRES001', expr.loc, { name: expr.name, what: 'constant' })
				return nullConstant(expr.loc)
			}
			return constant(value, expr.loc)
		}
		case 'ClassConstFetch':
			return checkClassConstant(expr.className, expr.name, expr.loc, state)
		case 'Binary':
			return checkBinary(expr, state)
		case 'Unary':
			return checkUnary(expr, state)
		case 'IncDec':
			return checkIncDec(expr, state)
		case 'Assign':
			return checkAssign(expr, state)
		case 'Ternary':
			return checkTernary(expr, state)
		case 'Call':
			return checkCall(expr, state)
		case 'MethodCall':
			return checkMethodCall(expr, state)
		case 'StaticCall':
			return checkStaticCall(expr, state)
		case 'PropertyFetch':
			return propertyRead(checkExpr(expr.object, state), expr.name, expr.loc, state)
		case 'Index':
			return checkIndex(expr.array, expr.index, expr.loc, state)
		case 'New':
			return checkNew(expr, state)
		case 'InstanceOf':
			return checkInstanceOf(expr.expr, expr.className, expr.loc, state)
		case 'Cast':
			return castTo(checkExpr(expr.expr, state), CAST_TARGETS[expr.to], state)
		case 'Match':
			return checkMatch(expr, state)
		case 'Isset':
			return checkIsset(expr, state)
		case 'Empty':
			return checkEmpty(expr, state)
		case 'Print':
			return { expr: toStringValue(checkExpr(expr.expr, state), state), kind: 'Print', loc: expr.loc, type: INT }
		case 'UnsupportedExpr':
			report(state, 'KLRES006', expr.loc, { construct: expr.construct })
			return nullConstant(expr.loc)
	}
}

export { nullConstant }
