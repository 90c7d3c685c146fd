/**
 * Function calls, method calls and instantiation.
 */

import type { Call, Expr, MethodCall, New, StaticCall } from '../core/ast.ts'
import type { SourceLocation } from '../core/location.ts'
import { BUILTIN_FUNCTIONS, builtinArity, selectVariant, variantReturnType } from './builtins.ts'
import { box, coerce, constant, discardInto } from './conversions.ts'
import { CONSTRUCTOR, resolveClassName } from './declarations.ts'
import { checkExpr, nullConstant, sequence, thisExpr } from './expressions.ts'
import { declScope, lookupMethod } from './members.ts'
import { type FunctionState, report } from './state.ts'
import type { MethodSymbol } from './symbols.ts'
import type { TypedExpr } from './typed.ts'
import { MIXED, objectOf, type PhpType, typeToString } from './types.ts'
import type { ConstValue } from './values.ts'

interface CallParam {
	readonly type: PhpType
	readonly default?: ConstValue | null
}

function arityText(min: number, max: number): string {
	return min === max ? `${min}` : `${min} to ${max}`
}

/**
 * Check call arguments against `params`: arity, conversion of each
 * argument to its parameter type, and defaults for omitted trailing ones.
 */
export function checkArguments(
	name: string,
	params: readonly CallParam[],
	args: readonly Expr[],
	state: FunctionState,
	loc: SourceLocation
): TypedExpr[] {
	const required = params.filter((p) => p.default === null || p.default === undefined).length
	if (args.length < required || args.length > params.length) {
		report(state, 'KLRES011', loc, { expected: arityText(required, params.length), found: args.length, name })
	}
	const typed: TypedExpr[] = []
	for (const [i, arg] of args.entries()) {
		const value = checkExpr(arg, state)
		const param = params[i]
		if (param === undefined) continue
		typed.push(coerce(value, param.type, state, `argument ${i + 1} of \`${name}\``))
	}
	for (const param of params.slice(args.length)) {
		if (param.default === null || param.default === undefined) break
		typed.push(coerce(constant(param.default, loc), param.type, state, 'default value'))
	}
	return typed
}

function checkBuiltin(expr: Call, state: FunctionState): TypedExpr | null {
	const builtin = BUILTIN_FUNCTIONS.get(expr.name.toLowerCase())
	if (builtin === undefined) return null
	const values = expr.args.map((arg) => checkExpr(arg, state))
	const types = values.map((value) => value.type)
	const variant = selectVariant(builtin, types, state.unit.symbols)
	const fallback = builtin.variants[builtin.variants.length - 1]
	const chosen = variant ?? fallback
	if (chosen === undefined) return null
	if (variant === undefined) {
		const { max, min } = builtinArity(builtin)
		if (values.length < min || values.length > max) {
			report(state, 'KLRES011', expr.loc, { expected: arityText(min, max), found: values.length, name: builtin.name })
			return { args: [], kind: 'Builtin', loc: expr.loc, name: builtin.name, runtime: chosen.runtime, type: MIXED }
		}
	}
	const args = values.map((value, i) => {
		const param = chosen.params[i]
		return param === undefined ? value : coerce(value, param.type, state, `argument ${i + 1} of \`${builtin.name}\``)
	})
	for (const param of chosen.params.slice(values.length)) {
		if (param.default === undefined) break
		args.push(constant(param.default, expr.loc))
	}
	return {
		args,
		kind: 'Builtin',
		loc: expr.loc,
		name: builtin.name,
		runtime: chosen.runtime,
		type: variantReturnType(chosen, types),
	}
}

export function checkCall(expr: Call, state: FunctionState): TypedExpr {
	const symbol = state.unit.symbols.lookupFunction(expr.name)
	if (symbol !== undefined) {
		const args = checkArguments(symbol.name, symbol.params, expr.args, state, expr.loc)
		return { args, callee: symbol.mangled, kind: 'Call', loc: expr.loc, type: symbol.returnType }
	}
	const builtin = checkBuiltin(expr, state)
	if (builtin !== null) return builtin
	report(state, 'KLRES001', expr.loc, { name: expr.name, what: 'function' })
	return sequence(
		expr.args.map((arg) => checkExpr(arg, state)),
		nullConstant(expr.loc)
	)
}

// ============================================================================
// Methods
// ============================================================================

function displayName(method: MethodSymbol): string {
	return `${method.owner}::${method.name}`
}

/**
 * Dispatch for `$receiver->method()` where the receiver's static class is
 * `className`.
 */
function dispatchOf(
	method: MethodSymbol,
	receiver: { className: string; exact: boolean },
	state: FunctionState
): { dispatch: 'static' | 'virtual' | 'interface'; target: string } {
	const symbols = state.unit.symbols
	if (symbols.lookupClass(method.owner)?.isInterface) {
		return { dispatch: 'interface', target: method.name.toLowerCase() }
	}
	const receiverClass = symbols.lookupClass(receiver.className)
	if (method.visibility === 'private' || method.isFinal || receiverClass?.isFinal || receiver.exact) {
		return { dispatch: 'static', target: method.mangled }
	}
	return { dispatch: 'virtual', target: method.name.toLowerCase() }
}

export function checkMethodCall(expr: MethodCall, state: FunctionState): TypedExpr {
	const object = checkExpr(expr.object, state)
	const type = object.type
	if (type.kind === 'object') {
		const method = lookupMethod(state, type.className, expr.method, expr.loc)
		if (method === null) {
			return sequence([object, ...expr.args.map((arg) => checkExpr(arg, state))], nullConstant(expr.loc))
		}
		const args = checkArguments(displayName(method), method.params, expr.args, state, expr.loc)
		if (method.isStatic) {
			const call: TypedExpr = {
				args,
				callee: method.mangled,
				kind: 'StaticCall',
				loc: expr.loc,
				thisArg: null,
				type: method.returnType,
			}
			return discardInto(object, call)
		}
		const { dispatch, target } = dispatchOf(method, type, state)
		return {
			args,
			className: type.className,
			dispatch,
			kind: 'MethodCall',
			loc: expr.loc,
			method: method.name,
			object,
			target,
			type: method.returnType,
		}
	}
	if (type.kind === 'mixed' || type.kind === 'null' || type.kind === 'never') {
		return {
			args: expr.args.map((arg) => box(checkExpr(arg, state), state, 'method argument')),
			kind: 'DynMethodCall',
			loc: expr.loc,
			method: expr.method,
			object: box(object, state, 'method call'),
			type: type.kind === 'never' ? type : MIXED,
		}
	}
	report(state, 'KLRES013', expr.loc, { operation: 'method call', type: typeToString(type) })
	return sequence([object, ...expr.args.map((arg) => checkExpr(arg, state))], nullConstant(expr.loc))
}

/**
 * `Class::method()`, `self::`, `parent::` and `static::`. Static methods
 * bind at compile time; instance methods called this way receive `$this`,
 * and through `static::` dispatch on its runtime class.
 */
export function checkStaticCall(expr: StaticCall, state: FunctionState): TypedExpr {
	const discard = () => sequence(
		expr.args.map((arg) => checkExpr(arg, state)),
		nullConstant(expr.loc)
	)
	const className = resolveClassName(expr.className, declScope(state), expr.loc)
	if (className === null) return discard()
	const method = lookupMethod(state, className, expr.method, expr.loc)
	if (method === null) return discard()
	const name = displayName(method)
	if (method.isStatic) {
		const args = checkArguments(name, method.params, expr.args, state, expr.loc)
		return { args, callee: method.mangled, kind: 'StaticCall', loc: expr.loc, thisArg: null, type: method.returnType }
	}
	const scope = state.classScope
	if (!state.hasThis || scope === null || !state.unit.symbols.isSubclassOf(scope, className)) {
		report(state, 'KLRES006', expr.loc, { construct: `calling instance method \`${name}\` statically` })
		return discard()
	}
	const self = thisExpr(state, expr.loc)
	const args = checkArguments(name, method.params, expr.args, state, expr.loc)
	if (expr.className.toLowerCase() === 'static') {
		const { dispatch, target } = dispatchOf(method, { className: scope, exact: false }, state)
		return {
			args,
			className: scope,
			dispatch,
			kind: 'MethodCall',
			loc: expr.loc,
			method: method.name,
			object: self,
			target,
			type: method.returnType,
		}
	}
	if (method.isAbstract) {
		report(state, 'KLRES013', expr.loc, { operation: 'a direct call', type: `abstract method \`${name}\`` })
		return discard()
	}
	return { args, callee: method.mangled, kind: 'StaticCall', loc: expr.loc, thisArg: self, type: method.returnType }
}

// ============================================================================
// Instantiation
// ============================================================================

export function checkNew(expr: New, state: FunctionState): TypedExpr {
	const discard = () => sequence(
		expr.args.map((arg) => checkExpr(arg, state)),
		nullConstant(expr.loc)
	)
	if (expr.className.toLowerCase() === 'static') {
		report(state, 'KLRES006', expr.loc, { construct: '`new static`' })
		return discard()
	}
	const className = resolveClassName(expr.className, declScope(state), expr.loc)
	if (className === null) return discard()
	const symbol = state.unit.symbols.lookupClass(className)
	if (symbol === undefined) return discard()
	if (symbol.isInterface || symbol.isAbstract) {
		report(state, 'KLRES010', expr.loc, {
			name: symbol.name,
			what: symbol.isInterface ? 'interface' : 'abstract class',
		})
		return discard()
	}
	const type = objectOf(symbol.name, true)
	const hasConstructor = state.unit.symbols.findMethod(symbol.name, CONSTRUCTOR) !== undefined
	if (!hasConstructor) {
		if (expr.args.length > 0) {
			report(state, 'KLRES011', expr.loc, { expected: '0', found: expr.args.length, name: `new ${symbol.name}` })
		}
		return { args: [], className: symbol.name, constructor: null, kind: 'New', loc: expr.loc, type }
	}
	const constructor = lookupMethod(state, symbol.name, CONSTRUCTOR, expr.loc)
	if (constructor === null) return discard()
	const args = checkArguments(displayName(constructor), constructor.params, expr.args, state, expr.loc)
	return { args, className: symbol.name, constructor: constructor.mangled, kind: 'New', loc: expr.loc, type }
}
