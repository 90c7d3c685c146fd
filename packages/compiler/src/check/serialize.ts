/**
 * Deterministic text form of a unit's own symbols, used to compare
 * symbol tables across runs.
 */

import type { ClassSymbol, FunctionSymbol, MethodSymbol, ParamSymbol, SymbolTable } from './symbols.ts'
import { typeToString } from './types.ts'
import { formatConst } from './values.ts'

function byName<T extends { name: string }>(a: T, b: T): number {
	const x = a.name.toLowerCase()
	const y = b.name.toLowerCase()
	return x < y ? -1 : x > y ? 1 : 0
}

function params(list: readonly ParamSymbol[]): string {
	return list
		.map((p) => `$${p.name}: ${typeToString(p.type)}${p.default === null ? '' : ` = ${formatConst(p.default)}`}`)
		.join(', ')
}

function functionLine(fn: FunctionSymbol): string {
	const foreign = fn.foreign === null ? '' : ` ffi(${fn.foreign.library}, ${fn.foreign.symbol})`
	return `function ${fn.name}(${params(fn.params)}): ${typeToString(fn.returnType)}${foreign}`
}

function methodLine(method: MethodSymbol): string {
	const modifiers = [
		method.visibility,
		method.isStatic ? 'static' : null,
		method.isFinal ? 'final' : null,
		method.isAbstract ? 'abstract' : null,
	].filter((m) => m !== null)
	const overrides = method.overrides === null ? '' : ` overrides ${method.overrides}`
	return `  method ${modifiers.join(' ')} ${method.name}(${params(method.params)}): ${typeToString(method.returnType)}${overrides}`
}

function classLines(symbol: ClassSymbol): string[] {
	const kind = symbol.isInterface ? 'interface' : symbol.isAbstract ? 'abstract class' : symbol.isFinal ? 'final class' : 'class'
	const parent = symbol.parent === null ? '' : ` extends ${symbol.parent}`
	const interfaces = symbol.interfaces.length === 0 ? '' : ` implements ${symbol.interfaces.join(', ')}`
	const lines = [`${kind} ${symbol.name}${parent}${interfaces}`]
	for (const constant of [...symbol.constants.values()].sort(byName)) {
		lines.push(`  const ${constant.visibility} ${constant.name} = ${formatConst(constant.value)}`)
	}
	for (const slot of symbol.layout.slots) {
		const value = slot.default === null ? '' : ` = ${formatConst(slot.default)}`
		const readonly = slot.isReadonly ? ' readonly' : ''
		lines.push(`  slot ${slot.slot} ${slot.visibility}${readonly} ${slot.owner}::$${slot.name}: ${typeToString(slot.type)}${value}`)
	}
	for (const method of [...symbol.methods.values()].sort(byName)) lines.push(methodLine(method))
	symbol.layout.vtable.forEach((entry, i) => {
		lines.push(`  vtable ${i} ${entry.method} -> ${entry.implementation}`)
	})
	return lines
}

export function serializeSymbolTable(symbols: SymbolTable): string {
	const lines = [`unit ${symbols.unit}`]
	for (const fn of symbols.ownFunctions().sort(byName)) lines.push(functionLine(fn))
	for (const symbol of symbols.ownClasses().sort(byName)) lines.push(...classLines(symbol))
	return `${lines.join('\n')}\n`
}
