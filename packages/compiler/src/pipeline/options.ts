/**
 * Pipeline configuration.
 */

import type { IrModule } from '../ir/types.ts'

/**
 * Settings recorded on every module for the runtime that executes it.
 */
export interface RuntimeConfig {
	readonly gcMode: 'refcount'
	/** Strings up to this many bytes are stored inline */
	readonly ssoThreshold: number
	readonly hashPolicy: 'robin-hood'
	/** Reference counts are plain integers; the IR never emits atomics */
	readonly atomicRefCounts: boolean
}

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
	atomicRefCounts: false,
	gcMode: 'refcount',
	hashPolicy: 'robin-hood',
	ssoThreshold: 23,
}

export const DEFAULT_TARGET = 'x86_64-unknown-linux-gnu'

/**
 * External optimizer or code generator. Receives a verified module and
 * returns the module to keep.
 */
export type Optimizer = (module: IrModule) => IrModule | Promise<IrModule>

export interface CompileOptions {
	/** Source path used in diagnostics and for the unit name */
	readonly filename?: string
	readonly maxErrors?: number
	/** Checked between stages */
	readonly signal?: AbortSignal
	/** Run the SSA verifier, IR validator and RC simulation after each stage */
	readonly verify?: boolean
	readonly optimizer?: Optimizer
	readonly target?: string
	readonly runtime?: Partial<RuntimeConfig>
	/** Compile against the built-in classes; on unless compiling the prelude itself */
	readonly prelude?: boolean
}

export interface ResolvedOptions {
	readonly maxErrors: number | undefined
	readonly signal: AbortSignal | undefined
	readonly verify: boolean
	readonly optimizer: Optimizer | undefined
	readonly target: string
	readonly runtime: RuntimeConfig
	readonly prelude: boolean
}

export function resolveOptions(options: CompileOptions = {}): ResolvedOptions {
	return {
		maxErrors: options.maxErrors,
		optimizer: options.optimizer,
		prelude: options.prelude ?? true,
		runtime: { ...DEFAULT_RUNTIME_CONFIG, ...options.runtime },
		signal: options.signal,
		target: options.target ?? DEFAULT_TARGET,
		verify: options.verify ?? true,
	}
}
