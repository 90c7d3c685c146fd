/**
 * Multi-unit scheduling.
 *
 * Units are parsed up front, ordered by their `require_once`
 * dependencies, and compiled in waves: every unit of a wave depends only
 * on units of earlier waves, so a wave runs concurrently and each unit
 * sees the finalized symbol tables of what it requires.
 */

import type { SymbolTable } from '../check/symbols.ts'
import { unitNameOf } from '../check/typed.ts'
import type { Require } from '../core/ast.ts'
import { CompileError } from '../core/errors.ts'
import { type ExecuteOptions, type ExecutionResult, execute } from '../runtime/interpreter.ts'
import {
	baseDependencies,
	type CompiledUnit,
	checkpoint,
	compileParsed,
	loadPrelude,
	type ParsedUnit,
	parseUnit,
	type UnitSource,
} from './compile.ts'
import { type CompileOptions, resolveOptions } from './options.ts'

interface UnitNode {
	readonly name: string
	readonly parsed: ParsedUnit
	readonly requires: readonly Require[]
}

function requiresOf(parsed: ParsedUnit): Require[] {
	return parsed.program.statements.filter((stmt): stmt is Require => stmt.kind === 'Require')
}

function failUnit(node: UnitNode): never {
	const { context } = node.parsed
	throw new CompileError(context.formatAllDiagnostics(), context.getErrors())
}

/** A dependency cycle through `start`, as unit names with `start` at both ends */
function findCycle(start: string, nodes: ReadonlyMap<string, UnitNode>): string[] {
	const path: string[] = []
	const visiting = new Set<string>()
	const visit = (name: string): string[] | null => {
		if (visiting.has(name)) return [...path.slice(path.indexOf(name)), name]
		visiting.add(name)
		path.push(name)
		for (const req of nodes.get(name)?.requires ?? []) {
			const found = visit(unitNameOf(req.path))
			if (found !== null) return found
		}
		path.pop()
		visiting.delete(name)
		return null
	}
	return visit(start) ?? [start]
}

/**
 * Waves of unit names in dependency order.
 *
 * @throws {CompileError} for an unknown dependency or a cycle
 */
function scheduleUnits(nodes: ReadonlyMap<string, UnitNode>): string[][] {
	for (const node of nodes.values()) {
		const unknown = node.requires.filter((req) => !nodes.has(unitNameOf(req.path)))
		for (const req of unknown) {
			node.parsed.context.emitAt('KLUNIT001', req.loc, { dependency: unitNameOf(req.path), unit: node.name })
		}
		if (unknown.length > 0) failUnit(node)
	}
	const done = new Set<string>()
	const waves: string[][] = []
	while (done.size < nodes.size) {
		const wave = [...nodes.values()]
			.filter((node) => !done.has(node.name))
			.filter((node) => node.requires.every((req) => done.has(unitNameOf(req.path))))
			.map((node) => node.name)
		if (wave.length === 0) {
			const stuck = [...nodes.values()].find((node) => !done.has(node.name))
			if (stuck === undefined) break
			const cycle = findCycle(stuck.name, nodes)
			const first = stuck.requires.find((req) => cycle.includes(unitNameOf(req.path))) ?? stuck.requires[0]
			if (first !== undefined) stuck.parsed.context.emitAt('KLUNIT002', first.loc, { cycle: cycle.join(' -> ') })
			failUnit(stuck)
		}
		for (const name of wave) done.add(name)
		waves.push(wave)
	}
	return waves
}

/**
 * Compile units that may require each other. Results come in dependency
 * order.
 *
 * @throws {CompileError} If a unit has errors or the dependencies are broken
 * @throws {CompileCancelledError} If `options.signal` fires
 */
export async function compileUnits(units: readonly UnitSource[], options: CompileOptions = {}): Promise<CompiledUnit[]> {
	const resolved = resolveOptions(options)
	const nodes = new Map<string, UnitNode>()
	for (const unit of units) {
		const parsed = parseUnit(unit, resolved)
		const name = unitNameOf(parsed.program.file)
		nodes.set(name, { name, parsed, requires: requiresOf(parsed) })
	}
	const waves = scheduleUnits(nodes)
	const base = await baseDependencies(resolved, options)
	const compiled = new Map<string, CompiledUnit>()
	const results: CompiledUnit[] = []
	for (const wave of waves) {
		const outputs = await Promise.all(
			wave.map(async (name) => {
				await checkpoint(resolved, name, 'resolution')
				const node = nodes.get(name)
				if (node === undefined) throw new Error(`unscheduled unit ${name}`)
				const dependencies: SymbolTable[] = [...base]
				for (const req of node.requires) {
					const dependency = compiled.get(unitNameOf(req.path))
					if (dependency !== undefined) dependencies.push(dependency.resolved.symbols)
				}
				return compileParsed(node.parsed, dependencies, resolved)
			})
		)
		for (const output of outputs) {
			compiled.set(output.name, output)
			results.push(output)
		}
	}
	return results
}

export interface RunOptions extends CompileOptions, Omit<ExecuteOptions, 'preload'> {}

/**
 * Compile units and run one of them through the reference runtime, with
 * the prelude loaded. Runs the first unit unless `options.entry` names
 * another.
 */
export async function compileAndRun(units: readonly UnitSource[], options: RunOptions = {}): Promise<ExecutionResult> {
	const compiled = await compileUnits(units, options)
	const first = units[0]
	const entry = options.entry ?? (first === undefined ? undefined : unitNameOf(first.filename))
	const prelude = resolveOptions(options).prelude ? [(await loadPrelude(options)).module] : []
	return execute([...prelude, ...compiled.map((unit) => unit.module)], {
		...options,
		entry,
		preload: prelude.map((module) => module.name),
	})
}
