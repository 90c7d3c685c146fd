/**
 * Runtime ABI: the runtime library functions lowered code calls.
 *
 * Arguments are borrowed unless listed in `consumes`; results are owned
 * by the caller. A function that may throw never consumes its arguments,
 * so the caller still owns them on the unwind path.
 */

import { readFileSync } from 'node:fs'
import { InternalCompilerError } from '../core/errors.ts'
import { type CallInst, type Effect, IrType } from './types.ts'

export interface RuntimeFunction {
	readonly name: string
	readonly params: readonly IrType[]
	/** Type of any further arguments */
	readonly variadic: IrType | null
	readonly returns: IrType
	readonly consumes: readonly number[]
	readonly mayThrow: boolean
	readonly effect: Effect
}

const IR_TYPES: readonly IrType[] = Object.values(IrType)

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function irType(value: unknown, where: string): IrType {
	const found = IR_TYPES.find((type) => type === value)
	if (found === undefined) throw new InternalCompilerError('abi', `${where}: unknown type ${String(value)}`)
	return found
}

function effect(value: unknown, where: string): Effect {
	if (value === 'none' || value === 'read' || value === 'write') return value
	throw new InternalCompilerError('abi', `${where}: unknown effect ${String(value)}`)
}

function parseEntry(name: string, raw: unknown): RuntimeFunction {
	if (!isRecord(raw) || !Array.isArray(raw.params)) {
		throw new InternalCompilerError('abi', `${name}: malformed entry`)
	}
	const consumes = Array.isArray(raw.consumes) ? raw.consumes.filter((i): i is number => typeof i === 'number') : []
	return {
		consumes,
		effect: effect(raw.effect, name),
		mayThrow: raw.mayThrow === true,
		name,
		params: raw.params.map((param: unknown) => irType(param, name)),
		returns: irType(raw.returns, name),
		variadic: raw.variadic === undefined ? null : irType(raw.variadic, name),
	}
}

function loadTable(): ReadonlyMap<string, RuntimeFunction> {
	const raw: unknown = JSON.parse(readFileSync(new URL('./runtime-abi.json', import.meta.url), 'utf8'))
	if (!isRecord(raw)) throw new InternalCompilerError('abi', 'runtime table is not an object')
	return new Map(Object.entries(raw).map(([name, entry]) => [name, parseEntry(name, entry)]))
}

export const RUNTIME_FUNCTIONS: ReadonlyMap<string, RuntimeFunction> = loadTable()

export function runtimeFunction(name: string): RuntimeFunction {
	const found = RUNTIME_FUNCTIONS.get(name)
	if (found === undefined) throw new InternalCompilerError('abi', `unknown runtime function ${name}`)
	return found
}

export function runtimeMayThrow(name: string): boolean {
	return runtimeFunction(name).mayThrow
}

/** Whether a call can unwind */
export type CallMayThrow = (call: CallInst) => boolean

/**
 * Runtime entries throw as the table says and foreign functions never
 * do; every other call may.
 */
export function callMayThrow(foreign: ReadonlySet<string> = new Set()): CallMayThrow {
	return (call) => {
		if (call.callee.kind === 'indirect') return true
		const runtime = RUNTIME_FUNCTIONS.get(call.callee.name)
		if (runtime !== undefined) return runtime.mayThrow
		return !foreign.has(call.callee.name)
	}
}
