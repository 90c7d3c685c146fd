import { readFile } from 'node:fs/promises'
import { basename, dirname, join, resolve } from 'node:path'
import {
	CompileError,
	type CompiledUnit,
	collectRequires,
	parseUnit,
	printCfg,
	printIrModule,
	printSsa,
	resolveOptions,
	type UncaughtException,
	type UnitSource,
} from '@keel/compiler'
import {
	interpolateMessage,
	KLCLI001,
	KLCLI002,
	KLCLI003,
	KLCLI004,
	KLCLI005,
	KLCLI006,
	KLCLI007,
} from '@keel/diagnostics'

export type OutputTarget = 'cfg' | 'ir' | 'ssa'

export const OUTPUT_TARGETS: readonly OutputTarget[] = ['ir', 'cfg', 'ssa']

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

// ============================================================================
// Messages
// ============================================================================

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		const message = interpolateMessage(KLCLI001.message, { path: filePath })
		return `[${KLCLI001.code}] ${message}`
	}
	const message = interpolateMessage(KLCLI002.message, { reason: getErrorMessage(error) })
	return `[${KLCLI002.code}] ${message}`
}

export function formatWriteError(error: unknown): string {
	const message = interpolateMessage(KLCLI003.message, { reason: getErrorMessage(error) })
	return `[${KLCLI003.code}] ${message}`
}

export function formatInvalidTargetError(target: string): string {
	const message = interpolateMessage(KLCLI004.message, { target })
	return `[${KLCLI004.code}] ${message}`
}

/** Compile errors carry their rendered diagnostics; anything else is wrapped */
export function formatCompileError(error: unknown): string {
	if (error instanceof CompileError) {
		return error.message
	}
	const message = interpolateMessage(KLCLI005.message, { reason: getErrorMessage(error) })
	return `[${KLCLI005.code}] ${message}`
}

export function formatUncaught(uncaught: UncaughtException): string {
	const message = interpolateMessage(KLCLI006.message, {
		className: uncaught.className,
		message: uncaught.message,
	})
	return `[${KLCLI006.code}] ${message}`
}

export function formatLeaks(count: number): string {
	const message = interpolateMessage(KLCLI007.message, { count })
	return `[${KLCLI007.code}] ${message}`
}

// ============================================================================
// Outputs
// ============================================================================

export function isValidTarget(value: string): value is OutputTarget {
	return value === 'ir' || value === 'cfg' || value === 'ssa'
}

export function resolveOutputFilename(inputPath: string, target: OutputTarget): string {
	return `${basename(inputPath, '.php')}.${target}`
}

export function resolveOutputPath(inputPath: string, outputDir: string | undefined, target: OutputTarget): string {
	return join(outputDir ?? '.', resolveOutputFilename(inputPath, target))
}

export function getOutputContent(unit: CompiledUnit, target: OutputTarget): string {
	switch (target) {
		case 'ir':
			return `${printIrModule(unit.module)}\n`
		case 'cfg':
			return `${unit.cfg.functions.map(printCfg).join('\n\n')}\n`
		case 'ssa':
			return `${unit.ssa.map(printSsa).join('\n\n')}\n`
	}
}

// ============================================================================
// Sources
// ============================================================================

export type ReadSource = (path: string) => Promise<string>

const readUtf8: ReadSource = (path) => readFile(path, 'utf-8')

/**
 * The input file and every file it requires, transitively. Required
 * paths are taken relative to the file that requires them.
 *
 * @throws {CompileError} If a file does not parse
 */
export async function loadUnits(inputPath: string, read: ReadSource = readUtf8): Promise<UnitSource[]> {
	const options = resolveOptions()
	const units: UnitSource[] = []
	const seen = new Set<string>()
	const queue = [inputPath]
	for (let path = queue.shift(); path !== undefined; path = queue.shift()) {
		const key = resolve(path)
		if (seen.has(key)) continue
		seen.add(key)
		const unit = { filename: path, source: await read(path) }
		units.push(unit)
		const { program } = parseUnit(unit, options)
		for (const required of collectRequires(program)) queue.push(join(dirname(path), required))
	}
	return units
}
