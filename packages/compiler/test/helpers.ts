import assert from 'node:assert'
import { check } from '../src/check/checker.ts'
import type { SymbolTable } from '../src/check/symbols.ts'
import type { ResolvedUnit } from '../src/check/typed.ts'
import { type CfgUnit, normalize } from '../src/cfg/normalize.ts'
import type { CfgFunction } from '../src/cfg/types.ts'
import type { Program } from '../src/core/ast.ts'
import { CompilationContext } from '../src/core/context.ts'
import { CompileError } from '../src/core/errors.ts'
import type { IrFunction } from '../src/ir/types.ts'
import { parse } from '../src/parse/parser.ts'
import { type CompiledUnit, compile, loadPrelude } from '../src/pipeline/compile.ts'
import type { CompileOptions } from '../src/pipeline/options.ts'
import { compileAndRun, type RunOptions } from '../src/pipeline/units.ts'
import type { ExecutionResult } from '../src/runtime/interpreter.ts'
import { buildSsa } from '../src/ssa/builder.ts'
import type { SsaFunction } from '../src/ssa/types.ts'

export function parseSource(source: string, filename = 'main.php'): { context: CompilationContext; program: Program } {
	const context = new CompilationContext(source, { filename })
	const result = parse(context)
	assert.ok(result.program, context.formatAllDiagnostics())
	return { context, program: result.program }
}

/** Resolve against the prelude; diagnostics stay on the returned context */
export async function resolveSource(
	source: string,
	dependencies: readonly SymbolTable[] = []
): Promise<{ context: CompilationContext; resolved: ResolvedUnit }> {
	const prelude = await loadPrelude()
	const { context, program } = parseSource(source)
	const resolved = check(program, [prelude.resolved.symbols, ...dependencies], context)
	return { context, resolved }
}

export async function normalizeSource(source: string): Promise<CfgUnit> {
	const { context, resolved } = await resolveSource(source)
	assert.deepStrictEqual(context.getErrors(), [], context.formatAllDiagnostics())
	return normalize(resolved, context)
}

export async function cfgOf(source: string, name: string): Promise<CfgFunction> {
	const unit = await normalizeSource(source)
	const fn = unit.functions.find((f) => f.name === name)
	assert.ok(fn, `no function ${name}`)
	return fn
}

export async function ssaOf(source: string, name: string): Promise<SsaFunction> {
	const fn = await cfgOf(source, name)
	return buildSsa(fn, new CompilationContext(source, { filename: 'main.php' }))
}

export function compileSource(source: string, options: CompileOptions = {}): Promise<CompiledUnit> {
	return compile(source, { filename: 'main.php', ...options })
}

export function irFunction(unit: CompiledUnit, name: string): IrFunction {
	const fn = unit.module.functions.find((f) => f.name === name)
	assert.ok(fn, `no IR function ${name}`)
	return fn
}

/** Diagnostic codes of a source that fails to compile */
export async function errorCodes(source: string): Promise<string[]> {
	try {
		await compileSource(source)
	} catch (error) {
		if (error instanceof CompileError) return error.diagnostics.map((d) => d.def.code)
		throw error
	}
	assert.fail('expected compilation to fail')
}

export function run(source: string, options: RunOptions = {}): Promise<ExecutionResult> {
	return compileAndRun([{ filename: 'main.php', source }], options)
}

/** Output of a program that must finish without an exception or a leak */
export async function output(source: string): Promise<string> {
	const result = await run(source)
	assert.strictEqual(result.uncaught, null, result.uncaught?.message)
	assert.deepStrictEqual(result.leaks, [])
	return result.output
}
