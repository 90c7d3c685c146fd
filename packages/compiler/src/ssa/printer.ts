/**
 * Text form of SSA functions.
 */

import { typeToString } from '../check/types.ts'
import { formatConst } from '../check/values.ts'
import { formatBlocks } from '../cfg/printer.ts'
import type { SsaBlock, SsaFunction, SsaOperand, ValueId } from './types.ts'

export function formatSsaOperand(operand: SsaOperand): string {
	return operand.kind === 'const' ? formatConst(operand.value) : `%${operand.id}`
}

function formatValue(value: ValueId): string {
	return `%${value}`
}

function phiLines(block: SsaBlock): string[] {
	return block.phis.map((phi) => {
		const incoming = phi.incoming.map((i) => `[bb${i.block}: ${formatSsaOperand(i.value)}]`).join(', ')
		return `%${phi.dest}: ${typeToString(phi.type)} = phi ${incoming}  ; ${phi.variable}`
	})
}

export function printSsa(fn: SsaFunction): string {
	const params = fn.params.map((p) => `%${p.value} $${p.name}: ${typeToString(p.type)}`).join(', ')
	const lines = [`function ${fn.name}(${params}): ${typeToString(fn.returnType)} {`]
	lines.push(...formatBlocks(fn.blocks, formatSsaOperand, formatValue, phiLines))
	lines.push('}')
	return lines.join('\n')
}
