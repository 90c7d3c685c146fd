/**
 * Local type inference.
 *
 * A body is checked repeatedly with diagnostics off. Each round joins the
 * types assigned to every local into the next round's view of it; once
 * no local changes, one last round with diagnostics on builds the typed
 * tree. Locals still changing after MAX_ROUNDS are widened to `mixed`.
 */

import { type FunctionState, finalizeLocals, settleRound, widenToMixed } from './state.ts'

export const MAX_ROUNDS = 8

function resetRound(state: FunctionState): void {
	state.nextTemp = 0
	state.breakTargets.length = 0
	state.observed.clear()
	for (const name of [...state.locals.keys()]) {
		if (name.startsWith('%')) state.locals.delete(name)
	}
}

/**
 * Run `check` to a fixed point of the local types, then once more for the
 * result.
 */
export function inferBody<T>(state: FunctionState, check: () => T): T {
	let rounds = 0
	for (;;) {
		resetRound(state)
		check()
		const changed = settleRound(state)
		if (changed.length === 0) break
		rounds++
		if (rounds >= MAX_ROUNDS) {
			for (const name of changed) widenToMixed(state, name)
		}
	}
	finalizeLocals(state)
	resetRound(state)
	state.inferring = false
	const result = check()
	state.observed.clear()
	return result
}
