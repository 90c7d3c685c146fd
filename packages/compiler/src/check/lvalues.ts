/**
 * Assignment targets.
 *
 * A place is an assignable location whose object and key operands have
 * already been evaluated into locals, so a compound assignment can read
 * and write it without evaluating them twice.
 */

import type { Assign, Expr, IncDec } from '../core/ast.ts'
import type { SourceLocation } from '../core/location.ts'
import { box, coerce, constant } from './conversions.ts'
import {
	checkExpr,
	indexRead,
	isNullable,
	joinBranches,
	keyTypeOf,
	local,
	nullConstant,
	propertyRead,
	sequence,
	stable,
} from './expressions.ts'
import { lookupProperty } from './members.ts'
import { checkBinaryOperator, compoundOperator } from './operators.ts'
import { type FunctionState, freshTemp, localType, observe, report } from './state.ts'
import type { TypedExpr, TypedLValue } from './typed.ts'
import { ANY_ARRAY, type ArrayType, arrayOf, BOOL, INT, join, MIXED, NEVER, type PhpType, typeToString } from './types.ts'
import { boolConst, intConst } from './values.ts'

export type Place =
	| { readonly kind: 'Local'; readonly name: string; readonly type: PhpType; readonly loc: SourceLocation }
	| {
			readonly kind: 'Prop'
			readonly object: TypedExpr
			readonly className: string
			readonly name: string
			readonly slot: number
			readonly type: PhpType
			readonly readonly: boolean
			readonly owner: string
			readonly loc: SourceLocation
	  }
	| { readonly kind: 'DynProp'; readonly object: TypedExpr; readonly name: string; readonly loc: SourceLocation }
	| { readonly kind: 'Index'; readonly base: Place; readonly key: TypedExpr | null; readonly loc: SourceLocation }

// ============================================================================
// Places
// ============================================================================

/**
 * Resolve `expr` as an assignment target. Object and key operands are
 * evaluated into `effects`. Returns `null` after reporting when `expr`
 * cannot be assigned.
 */
export function placeOf(expr: Expr, state: FunctionState, effects: TypedExpr[]): Place | null {
	switch (expr.kind) {
		case 'Variable': {
			if (expr.name === 'this') {
				report(state, 'KLRES006', expr.loc, { construct: 'assignment to $this' })
				return null
			}
			return { kind: 'Local', loc: expr.loc, name: expr.name, type: localType(state, expr.name) ?? NEVER }
		}
		case 'PropertyFetch': {
			const object = stable(checkExpr(expr.object, state), state, effects)
			const type = object.type
			if (type.kind === 'object') {
				const property = lookupProperty(state, type.className, expr.name, expr.loc)
				if (property === null) return null
				return {
					className: type.className,
					kind: 'Prop',
					loc: expr.loc,
					name: expr.name,
					object,
					owner: property.owner,
					readonly: property.isReadonly,
					slot: property.slot,
					type: property.type,
				}
			}
			if (type.kind === 'mixed' || type.kind === 'null' || type.kind === 'never') {
				return { kind: 'DynProp', loc: expr.loc, name: expr.name, object: box(object, state, 'property access') }
			}
			report(state, 'KLRES013', expr.loc, { operation: 'property assignment', type: typeToString(type) })
			return null
		}
		case 'Index': {
			const base = placeOf(expr.array, state, effects)
			if (base === null) return null
			const baseType = placeType(base)
			if (baseType.kind === 'string') {
				report(state, 'KLRES006', expr.loc, { construct: 'string offset assignment' })
				return null
			}
			if (baseType.kind !== 'array' && baseType.kind !== 'mixed' && baseType.kind !== 'never' && baseType.kind !== 'null') {
				report(state, 'KLRES013', expr.loc, { operation: 'array assignment', type: typeToString(baseType) })
				return null
			}
			const key = expr.index === null ? null : stable(checkExpr(expr.index, state), state, effects)
			return { base, key, kind: 'Index', loc: expr.loc }
		}
		default:
			report(state, 'KLRES013', expr.loc, { operation: 'assignment', type: 'an expression result' })
			return null
	}
}

/** Array type an index place writes through */
function containerType(base: Place): ArrayType {
	const type = placeType(base)
	return type.kind === 'array' ? type : ANY_ARRAY
}

export function placeType(place: Place): PhpType {
	switch (place.kind) {
		case 'Local':
		case 'Prop':
			return place.type
		case 'DynProp':
			return MIXED
		case 'Index': {
			const base = placeType(place.base)
			return base.kind === 'array' ? base.element : base.kind === 'never' ? NEVER : MIXED
		}
	}
}

export function readPlace(place: Place, state: FunctionState): TypedExpr {
	switch (place.kind) {
		case 'Local':
			return local(place.name, place.type, place.loc)
		case 'Prop':
		case 'DynProp':
			return propertyRead(place.object, place.name, place.loc, state)
		case 'Index':
			if (place.key === null) {
				report(state, 'KLRES013', place.loc, { operation: 'reading `[]`', type: typeToString(placeType(place.base)) })
				return nullConstant(place.loc)
			}
			return indexRead(readPlace(place.base, state), place.key, place.loc, state)
	}
}

function toLValue(place: Place): TypedLValue {
	switch (place.kind) {
		case 'Local':
			return { kind: 'Local', loc: place.loc, name: place.name, type: place.type }
		case 'Prop':
			return {
				className: place.className,
				kind: 'Prop',
				loc: place.loc,
				name: place.name,
				object: place.object,
				slot: place.slot,
				type: place.type,
			}
		case 'DynProp':
			return { kind: 'DynProp', loc: place.loc, name: place.name, object: place.object, type: MIXED }
		case 'Index': {
			const arrayType = containerType(place.base)
			return {
				arrayType,
				base: toLValue(place.base),
				key: place.key,
				kind: 'Index',
				loc: place.loc,
				type: arrayType.element,
			}
		}
	}
}

/**
 * Record that a value of `type` is written to `place`. Writes through an
 * index widen the array held by the root local.
 */
function widen(place: Place, type: PhpType, state: FunctionState): void {
	switch (place.kind) {
		case 'Local':
			observe(state, place.name, type)
			return
		case 'Index': {
			const base = placeType(place.base)
			const current = base.kind === 'array' ? base : base.kind === 'never' ? arrayOf(NEVER, NEVER) : null
			if (current === null) return
			const key = place.key === null ? INT : keyTypeOf(place.key, state)
			const symbols = state.unit.symbols
			widen(place.base, arrayOf(join(current.element, type, symbols), join(current.key, key, symbols)), state)
			return
		}
		default:
			return
	}
}

/**
 * Store `value` to `place`: the value is converted to the slot's type and
 * inference learns the new type of the written local.
 */
export function store(place: Place, value: TypedExpr, state: FunctionState, loc: SourceLocation): TypedExpr {
	if (place.kind === 'Prop' && place.readonly && state.classScope?.toLowerCase() !== place.owner.toLowerCase()) {
		report(state, 'KLRES014', loc, { name: `${place.owner}::$${place.name}` })
	}
	widen(place, value.type, state)
	const target = toLValue(place)
	const declared = place.kind === 'Local' ? localType(state, place.name) : target.type
	const slotType = declared === undefined || declared.kind === 'never' ? value.type : declared
	const converted = coerce(value, slotType, state, 'assignment')
	const lvalue: TypedLValue = target.kind === 'Local' ? { ...target, type: slotType } : target
	return { kind: 'Assign', loc, target: lvalue, type: converted.type, value: converted }
}

// ============================================================================
// Assignment Expressions
// ============================================================================

function issetPlace(place: Place, read: TypedExpr, state: FunctionState): TypedExpr | null {
	if (place.kind === 'Index' && place.key !== null) {
		const base = readPlace(place.base, state)
		if (base.type.kind === 'array') {
			return { array: base, arrayType: base.type, key: place.key, kind: 'IssetIndex', loc: place.loc, type: BOOL }
		}
	}
	if (place.kind === 'Local' && localType(state, place.name) === undefined) return null
	if (!isNullable(read.type)) return constant(boolConst(true), place.loc)
	return { expr: read, kind: 'IsNotNull', loc: place.loc, type: BOOL }
}

function checkCoalesceAssign(place: Place, expr: Assign, state: FunctionState, effects: TypedExpr[]): TypedExpr {
	if (place.kind === 'Local' && localType(state, place.name) === undefined) {
		return sequence(effects, store(place, checkExpr(expr.value, state), state, expr.loc))
	}
	const read = readPlace(place, state)
	const test = issetPlace(place, read, state)
	if (test === null || (test.kind === 'Const' && test.value.kind === 'bool' && test.value.value)) {
		return sequence(effects, read)
	}
	const assigned = store(place, checkExpr(expr.value, state), state, expr.loc)
	const { type, values } = joinBranches([read, assigned], state)
	const [then = read, otherwise = assigned] = values
	return sequence(effects, { cond: test, else: otherwise, kind: 'Ternary', loc: expr.loc, then, type })
}

export function checkAssign(expr: Assign, state: FunctionState): TypedExpr {
	const effects: TypedExpr[] = []
	const place = placeOf(expr.target, state, effects)
	if (place === null) {
		return sequence(effects, checkExpr(expr.value, state))
	}
	if (expr.op === '=') return sequence(effects, store(place, checkExpr(expr.value, state), state, expr.loc))
	if (expr.op === '??=') return checkCoalesceAssign(place, expr, state, effects)
	const op = compoundOperator(expr.op)
	if (op === null) {
		report(state, 'KLRES006', expr.loc, { construct: `\`${expr.op}\`` })
		return sequence(effects, checkExpr(expr.value, state))
	}
	const current = readPlace(place, state)
	const combined = checkBinaryOperator(op, current, checkExpr(expr.value, state), expr.loc, state)
	return sequence(effects, store(place, combined, state, expr.loc))
}

/**
 * `++`/`--`. The postfix form holds the old value in a temporary.
 */
export function checkIncDec(expr: IncDec, state: FunctionState): TypedExpr {
	const effects: TypedExpr[] = []
	const place = placeOf(expr.target, state, effects)
	if (place === null) return nullConstant(expr.loc)
	if (place.kind === 'Local' && place.type.kind === 'never' && localType(state, place.name) === undefined) {
		report(state, 'KLRES001', expr.loc, { name: `$${place.name}`, what: 'variable' })
	}
	const current = readPlace(place, state)
	const one = constant(intConst(1n), expr.loc)
	const op = expr.op === '++' ? '+' : '-'
	if (expr.prefix) {
		return sequence(effects, store(place, checkBinaryOperator(op, current, one, expr.loc, state), state, expr.loc))
	}
	const old = freshTemp(state, current.type)
	effects.push({
		kind: 'Assign',
		loc: expr.loc,
		target: { kind: 'Local', loc: expr.loc, name: old, type: current.type },
		type: current.type,
		value: current,
	})
	const previous = local(old, current.type, expr.loc)
	effects.push(store(place, checkBinaryOperator(op, previous, one, expr.loc, state), state, expr.loc))
	return sequence(effects, previous)
}

/**
 * `unset($a[$k])`. Unsetting variables and properties is not supported.
 */
export function checkUnsetTarget(
	expr: Expr,
	state: FunctionState
): { effects: TypedExpr[]; target: TypedLValue } | null {
	if (expr.kind === 'Variable') {
		report(state, 'KLRES006', expr.loc, { construct: 'unset on variables' })
		return null
	}
	if (expr.kind === 'PropertyFetch') {
		report(state, 'KLRES006', expr.loc, { construct: 'unset on properties' })
		return null
	}
	const effects: TypedExpr[] = []
	const place = placeOf(expr, state, effects)
	if (place === null) return null
	if (place.kind !== 'Index' || place.key === null) {
		report(state, 'KLRES013', expr.loc, { operation: 'unset', type: typeToString(placeType(place)) })
		return null
	}
	return { effects, target: toLValue(place) }
}
