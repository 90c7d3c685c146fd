import type { Diagnostic } from './context.ts'

/**
 * Thrown by the pipeline API when a unit fails with user-facing diagnostics.
 */
export class CompileError extends Error {
	readonly diagnostics: readonly Diagnostic[]

	constructor(message: string, diagnostics: readonly Diagnostic[] = []) {
		super(message)
		this.name = 'CompileError'
		this.diagnostics = diagnostics
	}
}

/**
 * A broken invariant inside the compiler after resolution succeeded.
 * Never reported as a diagnostic: the input was valid, the compiler is not.
 */
export class InternalCompilerError extends Error {
	constructor(stage: string, message: string) {
		super(`internal compiler error in ${stage}: ${message}`)
		this.name = 'InternalCompilerError'
	}
}

/**
 * Raised between stages when the caller's AbortSignal has fired.
 */
export class CompileCancelledError extends Error {
	readonly unit: string

	constructor(unit: string, stage: string) {
		super(`compilation of ${unit} cancelled before ${stage}`)
		this.name = 'CompileCancelledError'
		this.unit = unit
	}
}

/**
 * Throw an InternalCompilerError unless `condition` holds.
 */
export function invariant(condition: boolean, stage: string, message: string): asserts condition {
	if (!condition) throw new InternalCompilerError(stage, message)
}
