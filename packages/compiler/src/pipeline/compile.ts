/**
 * Single-unit pipeline: parse, resolve, normalize, SSA, lower, insert
 * reference counts, verify.
 */

import { readFileSync } from 'node:fs'
import { setImmediate as yieldToLoop } from 'node:timers/promises'
import { check } from '../check/checker.ts'
import type { SymbolTable } from '../check/symbols.ts'
import type { ResolvedUnit } from '../check/typed.ts'
import { type CfgUnit, normalize } from '../cfg/normalize.ts'
import { collectRequires, type Program } from '../core/ast.ts'
import { CompilationContext, type Diagnostic } from '../core/context.ts'
import { CompileCancelledError, CompileError } from '../core/errors.ts'
import { callMayThrow } from '../ir/abi.ts'
import { verifyRefCounts } from '../ir/refcheck.ts'
import type { IrModule } from '../ir/types.ts'
import { validateModule } from '../ir/validate.ts'
import { lowerUnit } from '../lower/lower.ts'
import { insertRefCounts } from '../lower/refcount.ts'
import { parse } from '../parse/parser.ts'
import { buildSsa } from '../ssa/builder.ts'
import type { SsaFunction } from '../ssa/types.ts'
import { verifySsa } from '../ssa/verify.ts'
import { type CompileOptions, type ResolvedOptions, resolveOptions } from './options.ts'

export const PRELUDE_UNIT = 'prelude'

const PRELUDE_FILE = 'prelude.php'

export interface UnitSource {
	readonly filename: string
	readonly source: string
}

/** Every stage's output for one unit */
export interface CompiledUnit {
	readonly name: string
	readonly filename: string
	readonly resolved: ResolvedUnit
	readonly cfg: CfgUnit
	readonly ssa: readonly SsaFunction[]
	readonly module: IrModule
	/** Warnings; a unit with errors throws instead */
	readonly diagnostics: readonly Diagnostic[]
	/** The warnings rendered with their source lines, empty when there are none */
	readonly report: string
}

/** A unit past the front-end, waiting for its dependencies */
export interface ParsedUnit {
	readonly context: CompilationContext
	readonly program: Program
}

function fail(context: CompilationContext): never {
	throw new CompileError(context.formatAllDiagnostics(), context.getErrors())
}

/** Throw if the caller gave up, then let other units run */
export async function checkpoint(options: ResolvedOptions, unit: string, stage: string): Promise<void> {
	if (options.signal?.aborted === true) throw new CompileCancelledError(unit, stage)
	await yieldToLoop()
	if (options.signal?.aborted) throw new CompileCancelledError(unit, stage)
}

/**
 * Parse one unit.
 *
 * @throws {CompileError} on syntax errors
 */
export function parseUnit(unit: UnitSource, options: ResolvedOptions): ParsedUnit {
	const context = new CompilationContext(unit.source, { filename: unit.filename, maxErrors: options.maxErrors })
	const result = parse(context)
	if (!result.succeeded || result.program === undefined) fail(context)
	return { context, program: result.program }
}

/**
 * Run every stage after parsing against the finalized symbol tables of
 * the unit's dependencies.
 */
export async function compileParsed(
	parsed: ParsedUnit,
	dependencies: readonly SymbolTable[],
	options: ResolvedOptions
): Promise<CompiledUnit> {
	const { context, program } = parsed
	const resolved = check(program, dependencies, context)
	const unit = resolved.symbols.unit
	if (context.hasErrors()) fail(context)

	await checkpoint(options, unit, 'normalization')
	const cfg = normalize(resolved, context)
	if (context.hasErrors()) fail(context)

	await checkpoint(options, unit, 'SSA construction')
	const ssa = cfg.functions.map((fn) => buildSsa(fn, context))
	if (context.hasErrors()) fail(context)
	if (options.verify) for (const fn of ssa) verifySsa(fn)

	await checkpoint(options, unit, 'lowering')
	const lowered = lowerUnit(ssa, resolved, options)
	const mayThrow = callMayThrow(new Set(lowered.externs.map((ext) => ext.name)))
	let module: IrModule = { ...lowered, functions: lowered.functions.map((fn) => insertRefCounts(fn, mayThrow)) }
	if (options.verify) verifyModule(module)

	if (options.optimizer !== undefined) {
		await checkpoint(options, unit, 'optimization')
		module = await options.optimizer(module)
		if (options.verify) verifyModule(module)
	}

	return {
		cfg,
		diagnostics: context.getDiagnostics(),
		filename: context.filename,
		module,
		name: unit,
		report: context.formatAllDiagnostics(),
		resolved,
		ssa,
	}
}

/**
 * Validate a lowered module and simulate its reference counts.
 *
 * @throws {InternalCompilerError} on the first broken invariant
 */
export function verifyModule(module: IrModule): void {
	validateModule(module)
	const mayThrow = callMayThrow(new Set(module.externs.map((ext) => ext.name)))
	for (const fn of module.functions) verifyRefCounts(fn, mayThrow)
}

// ============================================================================
// Prelude
// ============================================================================

const preludes = new Map<string, Promise<CompiledUnit>>()

/**
 * The built-in classes, compiled once per target and runtime
 * configuration.
 */
export function loadPrelude(options: CompileOptions = {}): Promise<CompiledUnit> {
	const resolved = resolveOptions({ ...options, optimizer: undefined, prelude: false, signal: undefined })
	const key = JSON.stringify([resolved.target, resolved.runtime, resolved.verify])
	let pending = preludes.get(key)
	if (pending === undefined) {
		const source = readFileSync(new URL(`../prelude/${PRELUDE_FILE}`, import.meta.url), 'utf8')
		pending = compileParsed(parseUnit({ filename: PRELUDE_FILE, source }, resolved), [], resolved)
		preludes.set(key, pending)
	}
	return pending
}

/** Dependencies every unit sees before the units it requires */
export async function baseDependencies(options: ResolvedOptions, raw: CompileOptions): Promise<SymbolTable[]> {
	if (!options.prelude) return []
	return [(await loadPrelude(raw)).resolved.symbols]
}

/**
 * Compile one unit that requires no other unit.
 *
 * @throws {CompileError} If the unit has errors
 * @throws {CompileCancelledError} If `options.signal` fires
 * @throws {InternalCompilerError} If verification finds a compiler bug
 */
export async function compile(source: string, options: CompileOptions = {}): Promise<CompiledUnit> {
	const resolved = resolveOptions(options)
	const parsed = parseUnit({ filename: options.filename ?? '<input>', source }, resolved)
	const requires = collectRequires(parsed.program)
	if (requires.length > 0) {
		for (const stmt of parsed.program.statements) {
			if (stmt.kind === 'Require') {
				parsed.context.emitAt('KLUNIT001', stmt.loc, { dependency: stmt.path, unit: parsed.program.file })
			}
		}
		fail(parsed.context)
	}
	await checkpoint(resolved, parsed.program.file, 'resolution')
	return compileParsed(parsed, await baseDependencies(resolved, options), resolved)
}
