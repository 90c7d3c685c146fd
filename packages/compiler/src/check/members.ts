/**
 * Class member lookup with visibility checks.
 */

import type { Visibility } from '../core/ast.ts'
import type { SourceLocation } from '../core/location.ts'
import { bodyScope, type DeclScope } from './declarations.ts'
import { type FunctionState, report } from './state.ts'
import type { ClassConstSymbol, MethodSymbol, PropertySymbol } from './symbols.ts'

/** Declaration scope for names used inside the function being checked */
export function declScope(state: FunctionState): DeclScope {
	return bodyScope(state.unit.symbols, state.classScope, (code, loc, args) => report(state, code, loc, args))
}

/**
 * Private members are visible inside the declaring class; protected ones
 * anywhere in the declaring class's hierarchy.
 */
export function canAccess(state: FunctionState, owner: string, visibility: Visibility): boolean {
	if (visibility === 'public') return true
	const scope = state.classScope
	if (scope === null) return false
	if (visibility === 'private') return scope.toLowerCase() === owner.toLowerCase()
	const symbols = state.unit.symbols
	return symbols.isSubclassOf(scope, owner) || symbols.isSubclassOf(owner, scope)
}

function checkAccess(
	state: FunctionState,
	member: { owner: string; visibility: Visibility; name: string },
	what: string,
	loc: SourceLocation
): void {
	if (canAccess(state, member.owner, member.visibility)) return
	report(state, 'KLRES004', loc, {
		name: `${member.owner}::${member.name}`,
		scope: state.classScope === null ? 'outside any class' : `class ${state.classScope}`,
		visibility: member.visibility,
		what,
	})
}

export function lookupProperty(
	state: FunctionState,
	className: string,
	name: string,
	loc: SourceLocation
): PropertySymbol | null {
	const property = state.unit.symbols.findProperty(className, name)
	if (property === undefined) {
		report(state, 'KLRES001', loc, { name: `${className}::$${name}`, what: 'property' })
		return null
	}
	checkAccess(state, { ...property, name: `$${name}` }, 'property', loc)
	return property
}

export function lookupMethod(
	state: FunctionState,
	className: string,
	name: string,
	loc: SourceLocation
): MethodSymbol | null {
	const method = state.unit.symbols.findMethod(className, name)
	if (method === undefined) {
		report(state, 'KLRES001', loc, { name: `${className}::${name}`, what: 'method' })
		return null
	}
	checkAccess(state, method, 'method', loc)
	return method
}

export function lookupConstant(
	state: FunctionState,
	className: string,
	name: string,
	loc: SourceLocation
): ClassConstSymbol | null {
	const constant = state.unit.symbols.findConstant(className, name)
	if (constant === undefined) {
		report(state, 'KLRES001', loc, { name: `${className}::${name}`, what: 'constant' })
		return null
	}
	checkAccess(state, constant, 'constant', loc)
	return constant
}
