/**
 * Checker state shared by the declaration, expression and statement passes.
 */

import type { SourceLocation } from '../core/location.ts'
import type { CompilationContext } from '../core/context.ts'
import type { DiagnosticArgs, DiagnosticCode } from '../core/diagnostics.ts'
import type { SymbolTable } from './symbols.ts'
import { join, MIXED, NEVER, type PhpType, sameType, settle } from './types.ts'

/**
 * Per-unit state. Lives for one `check` call.
 */
export interface UnitState {
	readonly context: CompilationContext
	readonly symbols: SymbolTable
	/** Unit names from literal `require_once` paths */
	readonly requires: string[]
}

/**
 * What a loop or switch allows `break`/`continue` to target.
 */
export type BreakTarget = 'loop' | 'switch'

/**
 * Per-function state. The inference driver runs the body several times
 * with `inferring` set, then once more to produce the typed tree.
 */
export interface FunctionState {
	readonly unit: UnitState
	/** Display name for diagnostics */
	readonly name: string
	/** Class whose members are in scope (`self`, private access) */
	readonly classScope: string | null
	/** `$this` is available */
	readonly hasThis: boolean
	readonly returnType: PhpType
	/** Parameters keep their declared type; assignments convert to it */
	readonly params: ReadonlyMap<string, PhpType>
	/** Inferred local types, refined between inference rounds */
	readonly locals: Map<string, PhpType>
	/** Joined types observed during the current round */
	readonly observed: Map<string, PhpType>
	readonly breakTargets: BreakTarget[]
	inferring: boolean
	nextTemp: number
}

export function createFunctionState(
	unit: UnitState,
	init: {
		name: string
		classScope: string | null
		hasThis: boolean
		returnType: PhpType
		params: ReadonlyMap<string, PhpType>
	}
): FunctionState {
	return {
		...init,
		breakTargets: [],
		inferring: true,
		locals: new Map(init.params),
		nextTemp: 0,
		observed: new Map(),
		unit,
	}
}

/**
 * Report a diagnostic unless an inference round is running. Inference
 * rounds see provisional types and would report spurious mismatches.
 */
export function report(
	state: FunctionState,
	code: DiagnosticCode,
	loc: SourceLocation,
	args?: DiagnosticArgs
): void {
	if (!state.inferring) state.unit.context.emitAt(code, loc, args)
}

/**
 * Type of a local as the current round sees it. Locals first assigned in
 * this round start from what the round has observed.
 */
export function localType(state: FunctionState, name: string): PhpType | undefined {
	return state.params.get(name) ?? state.locals.get(name) ?? state.observed.get(name)
}

/**
 * Record that `type` flows into local `name`.
 */
export function observe(state: FunctionState, name: string, type: PhpType): void {
	if (state.params.has(name)) return
	const previous = state.observed.get(name) ?? NEVER
	state.observed.set(name, join(previous, type, state.unit.symbols))
}

/**
 * Fresh compiler temporary of the given type. Temporaries are named with
 * a `%` prefix so they never collide with source variables.
 */
export function freshTemp(state: FunctionState, type: PhpType): string {
	const name = `%t${state.nextTemp++}`
	state.locals.set(name, type)
	return name
}

/**
 * Fold the observations of one round into the local type map.
 * Returns the locals whose type changed.
 */
export function settleRound(state: FunctionState): string[] {
	const changed: string[] = []
	for (const [name, type] of state.observed) {
		const before = state.locals.get(name)
		const after = before === undefined ? type : join(before, type, state.unit.symbols)
		if (before === undefined || !sameType(before, after)) {
			state.locals.set(name, after)
			changed.push(name)
		}
	}
	state.observed.clear()
	return changed
}

/** Widen every inferred local to its final type. */
export function finalizeLocals(state: FunctionState): void {
	for (const [name, type] of state.locals) {
		if (!state.params.has(name)) state.locals.set(name, settle(type))
	}
}

/** Give up on a local that keeps changing. */
export function widenToMixed(state: FunctionState, name: string): void {
	state.locals.set(name, MIXED)
}
