/**
 * Statement checking.
 */

import type { CatchClause, Foreach, If, Stmt, Switch, Try } from '../core/ast.ts'
import { coerce, toCondition, toStringValue } from './conversions.ts'
import { resolveClassName } from './declarations.ts'
import { checkExpr, stable } from './expressions.ts'
import { checkUnsetTarget } from './lvalues.ts'
import { declScope } from './members.ts'
import { checkBinaryOperator } from './operators.ts'
import { type BreakTarget, type FunctionState, localType, observe, report } from './state.ts'
import { type TypedCase, type TypedCatch, type TypedExpr, type TypedStmt, type TypedVar, unitNameOf } from './typed.ts'
import {
	ANY_ARRAY,
	type ArrayType,
	INT,
	isAssignable,
	join,
	MIXED,
	NEVER,
	objectOf,
	type PhpType,
	settle,
	typeToString,
} from './types.ts'

export const THROWABLE = 'Throwable'

function exprStmt(expr: TypedExpr): TypedStmt {
	return { expr, kind: 'Expr', loc: expr.loc }
}

export function checkBlock(statements: readonly Stmt[], state: FunctionState): TypedStmt[] {
	return statements.flatMap((stmt) => checkStmt(stmt, state))
}

function inBreakable<T>(state: FunctionState, target: BreakTarget, body: () => T): T {
	state.breakTargets.push(target)
	try {
		return body()
	} finally {
		state.breakTargets.pop()
	}
}

/**
 * Bind a loop or catch variable to a value of `type`.
 */
function bindVariable(name: string, type: PhpType, state: FunctionState, loc: Stmt['loc']): TypedVar {
	if (name === 'this') {
		report(state, 'KLRES006', loc, { construct: 'assignment to $this' })
		return { name, type: MIXED }
	}
	const declared = state.params.get(name)
	if (declared !== undefined) {
		if (!isAssignable(declared, type, state.unit.symbols)) {
			report(state, 'KLRES002', loc, {
				context: `assignment to $${name}`,
				expected: typeToString(declared),
				found: typeToString(type),
			})
		}
		return { name, type: declared }
	}
	observe(state, name, type)
	return { name, type: localType(state, name) ?? type }
}

// ============================================================================
// Conditionals
// ============================================================================

function checkIf(stmt: If, state: FunctionState): TypedStmt {
	const cond = toCondition(checkExpr(stmt.cond, state), state)
	const then = checkBlock(stmt.then, state)
	const branches = stmt.elseIfs.map((branch) => {
		const test = toCondition(checkExpr(branch.cond, state), state)
		return { body: checkBlock(branch.body, state), cond: test, loc: branch.loc }
	})
	let otherwise: TypedStmt[] = stmt.else === null ? [] : checkBlock(stmt.else, state)
	for (const branch of branches.reverse()) {
		otherwise = [{ cond: branch.cond, else: otherwise, kind: 'If', loc: branch.loc, then: branch.body }]
	}
	return { cond, else: otherwise, kind: 'If', loc: stmt.loc, then }
}

/**
 * `switch` compares its subject, held in a temporary, to each case with
 * loose equality, in source order.
 */
function checkSwitch(stmt: Switch, state: FunctionState): TypedStmt[] {
	const effects: TypedExpr[] = []
	const subject = stable(checkExpr(stmt.subject, state), state, effects)
	const cases = inBreakable(state, 'switch', () =>
		stmt.cases.map(
			(c): TypedCase => ({
				body: checkBlock(c.body, state),
				loc: c.loc,
				test: c.test === null ? null : checkBinaryOperator('==', subject, checkExpr(c.test, state), c.test.loc, state),
			})
		)
	)
	return [...effects.map(exprStmt), { cases, kind: 'Switch', loc: stmt.loc }]
}

// ============================================================================
// Loops
// ============================================================================

function checkForeach(stmt: Foreach, state: FunctionState): TypedStmt[] {
	if (stmt.byRef) report(state, 'KLRES006', stmt.loc, { construct: 'foreach by reference' })
	let subject = checkExpr(stmt.subject, state)
	let arrayType: ArrayType
	switch (subject.type.kind) {
		case 'array':
			arrayType = subject.type
			break
		case 'mixed':
		case 'null':
			subject = coerce(subject, ANY_ARRAY, state, 'foreach')
			arrayType = ANY_ARRAY
			break
		case 'never':
			arrayType = ANY_ARRAY
			break
		default:
			report(state, 'KLRES013', subject.loc, { operation: 'foreach', type: typeToString(subject.type) })
			arrayType = ANY_ARRAY
	}
	const element = state.inferring ? arrayType.element : settle(arrayType.element)
	const keyType = arrayType.key.kind === 'never' ? (state.inferring ? NEVER : INT) : arrayType.key
	const key = stmt.key === null ? null : bindVariable(stmt.key, keyType, state, stmt.loc)
	const value = bindVariable(stmt.value, element, state, stmt.loc)
	const body = inBreakable(state, 'loop', () => checkBlock(stmt.body, state))
	return [{ arrayType, body, key, kind: 'Foreach', loc: stmt.loc, subject, value }]
}

// ============================================================================
// Exceptions
// ============================================================================

function checkCatch(clause: CatchClause, state: FunctionState): TypedCatch & { depth: number } {
	const symbols = state.unit.symbols
	const classes: string[] = []
	for (const name of clause.types) {
		const resolved = resolveClassName(name, declScope(state), clause.loc)
		if (resolved === null) continue
		if (!symbols.isSubclassOf(resolved, THROWABLE)) {
			report(state, 'KLRES002', clause.loc, { context: 'catch', expected: THROWABLE, found: resolved })
			continue
		}
		classes.push(resolved)
	}
	let caught: PhpType = NEVER
	for (const name of classes) caught = join(caught, objectOf(name), symbols)
	if (caught.kind !== 'object') caught = objectOf(THROWABLE)
	const variable = clause.variable === null ? null : bindVariable(clause.variable, caught, state, clause.loc)
	const depth = Math.max(0, ...classes.map((name) => symbols.inheritanceDepth(name)))
	return { body: checkBlock(clause.body, state), classes, depth, loc: clause.loc, variable }
}

/**
 * Catch clauses are tried most specific first: deeper classes before their
 * ancestors, ties in source order.
 */
function checkTry(stmt: Try, state: FunctionState): TypedStmt {
	const body = checkBlock(stmt.body, state)
	const catches = stmt.catches
		.map((clause) => checkCatch(clause, state))
		.map((clause, index) => ({ clause, index }))
		.sort((a, b) => b.clause.depth - a.clause.depth || a.index - b.index)
		.map(({ clause: { body, classes, loc, variable } }): TypedCatch => ({ body, classes, loc, variable }))
	const cleanup = stmt.finally === null ? null : checkBlock(stmt.finally, state)
	return { body, catches, finally: cleanup, kind: 'Try', loc: stmt.loc }
}

// ============================================================================
// Dispatch
// ============================================================================

function checkJump(kind: 'Break' | 'Continue', depth: number, state: FunctionState, loc: Stmt['loc']): TypedStmt[] {
	if (depth < 1 || depth > state.breakTargets.length) {
		report(state, 'KLRES008', loc, { depth, keyword: kind === 'Break' ? 'break' : 'continue' })
		return []
	}
	return [{ depth, kind, loc }]
}

export function checkStmt(stmt: Stmt, state: FunctionState): TypedStmt[] {
	switch (stmt.kind) {
		case 'ExpressionStatement':
			return [exprStmt(checkExpr(stmt.expr, state))]
		case 'Echo':
			return [
				{ kind: 'Echo', loc: stmt.loc, values: stmt.exprs.map((expr) => toStringValue(checkExpr(expr, state), state)) },
			]
		case 'If':
			return [checkIf(stmt, state)]
		case 'While': {
			const cond = toCondition(checkExpr(stmt.cond, state), state)
			const body = inBreakable(state, 'loop', () => checkBlock(stmt.body, state))
			return [{ body, cond, kind: 'While', loc: stmt.loc }]
		}
		case 'DoWhile': {
			const body = inBreakable(state, 'loop', () => checkBlock(stmt.body, state))
			return [{ body, cond: toCondition(checkExpr(stmt.cond, state), state), kind: 'DoWhile', loc: stmt.loc }]
		}
		case 'For': {
			const init = stmt.init.map((expr) => checkExpr(expr, state))
			const cond = stmt.cond.map((expr, i) => {
				const value = checkExpr(expr, state)
				return i === stmt.cond.length - 1 ? toCondition(value, state) : value
			})
			const body = inBreakable(state, 'loop', () => checkBlock(stmt.body, state))
			const update = stmt.update.map((expr) => checkExpr(expr, state))
			return [{ body, cond, init, kind: 'For', loc: stmt.loc, update }]
		}
		case 'Foreach':
			return checkForeach(stmt, state)
		case 'Switch':
			return checkSwitch(stmt, state)
		case 'Try':
			return [checkTry(stmt, state)]
		case 'Return': {
			const expected = state.returnType
			if (stmt.value === null) {
				if (expected.kind !== 'void' && expected.kind !== 'mixed') {
					report(state, 'KLRES002', stmt.loc, { context: 'return', expected: typeToString(expected), found: 'void' })
				}
				return [{ kind: 'Return', loc: stmt.loc, value: null }]
			}
			const value = checkExpr(stmt.value, state)
			if (expected.kind === 'void') {
				report(state, 'KLRES002', stmt.loc, { context: 'return', expected: 'void', found: typeToString(value.type) })
				return [exprStmt(value), { kind: 'Return', loc: stmt.loc, value: null }]
			}
			return [{ kind: 'Return', loc: stmt.loc, value: coerce(value, expected, state, 'return value') }]
		}
		case 'Break':
		case 'Continue':
			return checkJump(stmt.kind, stmt.depth, state, stmt.loc)
		case 'Throw':
			return [
				{ kind: 'Throw', loc: stmt.loc, value: coerce(checkExpr(stmt.value, state), objectOf(THROWABLE), state, 'throw') },
			]
		case 'Block':
			return checkBlock(stmt.body, state)
		case 'Unset':
			return stmt.targets.flatMap((target): TypedStmt[] => {
				const checked = checkUnsetTarget(target, state)
				if (checked === null) return []
				return [...checked.effects.map(exprStmt), { kind: 'Unset', loc: target.loc, target: checked.target }]
			})
		case 'Require': {
			const unit = unitNameOf(stmt.path)
			if (!state.unit.requires.includes(unit)) state.unit.requires.push(unit)
			return [{ kind: 'Require', loc: stmt.loc, unit }]
		}
		case 'Nop':
			return []
		case 'UnsupportedStatement':
			report(state, 'KLRES006', stmt.loc, { construct: stmt.construct })
			return []
		case 'FunctionDecl':
		case 'ClassDecl':
		case 'InterfaceDecl':
			report(state, 'KLRES006', stmt.loc, { construct: 'conditional declarations' })
			return []
	}
}
