/**
 * Symbol & type resolution for one unit.
 *
 * Declares the unit's functions and classes into a fresh symbol table
 * that reads through to its dependencies, then checks every body and
 * returns the typed tree. Diagnostics go to the context; the result is
 * only meaningful when no errors were reported.
 */

import { type FunctionDecl, isDeclaration, type MethodDecl, type Program, type Stmt } from '../core/ast.ts'
import type { CompilationContext } from '../core/context.ts'
import type { SourceLocation } from '../core/location.ts'
import { declareUnit } from './declarations.ts'
import { inferBody } from './inference.ts'
import { checkBlock } from './statements.ts'
import { createFunctionState, type UnitState } from './state.ts'
import { type ClassSymbol, type FunctionSymbol, type ParamSymbol, SymbolTable } from './symbols.ts'
import { type ResolvedUnit, type TypedFunction, type TypedVar, unitMainName, unitNameOf } from './typed.ts'
import { objectOf, type PhpType, VOID } from './types.ts'

interface BodyInit {
	readonly name: string
	readonly displayName: string
	readonly loc: SourceLocation
	readonly params: readonly ParamSymbol[]
	readonly returnType: PhpType
	readonly thisClass: string | null
	readonly classScope: string | null
	readonly body: readonly Stmt[]
}

function checkBody(unit: UnitState, init: BodyInit): TypedFunction {
	const params = new Map<string, PhpType>(init.params.map((p) => [p.name, p.type]))
	const state = createFunctionState(unit, {
		classScope: init.classScope,
		hasThis: init.thisClass !== null,
		name: init.displayName,
		params,
		returnType: init.returnType,
	})
	const body = inferBody(state, () => checkBlock(init.body, state))
	const typedParams: TypedVar[] = init.params.map((p) => ({ name: p.name, type: p.type }))
	const locals = new Map(state.locals)
	if (init.thisClass !== null) {
		const self = objectOf(init.thisClass)
		typedParams.unshift({ name: 'this', type: self })
		locals.set('this', self)
	}
	return {
		body,
		loc: init.loc,
		locals,
		name: init.name,
		params: typedParams,
		returnType: init.returnType,
		thisClass: init.thisClass,
		unit: unit.symbols.unit,
	}
}

function checkFunction(unit: UnitState, decl: FunctionDecl, symbol: FunctionSymbol): TypedFunction | null {
	if (decl.body === null) return null
	return checkBody(unit, {
		body: decl.body,
		classScope: null,
		displayName: symbol.name,
		loc: decl.loc,
		name: symbol.mangled,
		params: symbol.params,
		returnType: symbol.returnType,
		thisClass: null,
	})
}

function checkMethods(unit: UnitState, methods: readonly MethodDecl[], owner: ClassSymbol): TypedFunction[] {
	const result: TypedFunction[] = []
	for (const decl of methods) {
		const symbol = owner.methods.get(decl.name.toLowerCase())
		if (symbol === undefined || symbol.loc !== decl.loc || decl.body === null || symbol.isAbstract) continue
		result.push(
			checkBody(unit, {
				body: decl.body,
				classScope: owner.name,
				displayName: symbol.mangled,
				loc: decl.loc,
				name: symbol.mangled,
				params: symbol.params,
				returnType: symbol.returnType,
				thisClass: symbol.isStatic ? null : owner.name,
			})
		)
	}
	return result
}

/**
 * Resolve and type-check `program` against the finalized symbol tables of
 * its dependencies.
 */
export function check(
	program: Program,
	dependencies: readonly SymbolTable[],
	context: CompilationContext
): ResolvedUnit {
	const unitName = unitNameOf(program.file)
	const symbols = new SymbolTable(unitName, dependencies)
	declareUnit(program.statements, symbols, (code, loc, args) => context.emitAt(code, loc, args))
	const unit: UnitState = { context, requires: [], symbols }

	const main = checkBody(unit, {
		body: program.statements.filter((stmt) => !isDeclaration(stmt)),
		classScope: null,
		displayName: 'top-level code',
		loc: program.loc,
		name: unitMainName(unitName),
		params: [],
		returnType: VOID,
		thisClass: null,
	})

	const functions: TypedFunction[] = [main]
	const methods: TypedFunction[] = []
	const externs: FunctionSymbol[] = []
	for (const stmt of program.statements) {
		if (stmt.kind === 'FunctionDecl') {
			const symbol = symbols.lookupFunction(stmt.name)
			if (symbol === undefined || symbol.loc !== stmt.loc) continue
			if (symbol.foreign !== null) {
				externs.push(symbol)
				continue
			}
			const typed = checkFunction(unit, stmt, symbol)
			if (typed !== null) functions.push(typed)
		} else if (stmt.kind === 'ClassDecl' || stmt.kind === 'InterfaceDecl') {
			const symbol = symbols.lookupClass(stmt.name)
			if (symbol === undefined || symbol.loc !== stmt.loc) continue
			methods.push(...checkMethods(unit, stmt.methods, symbol))
		}
	}

	return {
		classes: symbols.ownClasses(),
		externs,
		file: program.file,
		functions: [...functions, ...methods],
		requires: unit.requires,
		symbols,
	}
}
