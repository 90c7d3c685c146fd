/**
 * SSA well-formedness checks.
 *
 * - every phi has one incoming value per predecessor, in predecessor order
 * - every value is defined exactly once
 * - every use is dominated by its definition; a phi operand must be
 *   available at the end of its predecessor
 *
 * Violations are compiler bugs and throw InternalCompilerError.
 */

import { type BlockId, instOperands, terminatorOperands } from '../cfg/types.ts'
import { InternalCompilerError } from '../core/errors.ts'
import { cfgSuccessors, computeDominators } from './dominance.ts'
import type { SsaFunction, SsaOperand, ValueId } from './types.ts'

interface Definition {
	readonly block: BlockId
	/** Position in the block; -1 for values live on entry */
	readonly index: number
}

function fail(fn: SsaFunction, message: string): never {
	throw new InternalCompilerError('ssa-verify', `${fn.name}: ${message}`)
}

function values(operands: readonly SsaOperand[]): ValueId[] {
	return operands.flatMap((operand) => (operand.kind === 'value' ? [operand.id] : []))
}

export function verifySsa(fn: SsaFunction): void {
	const tree = computeDominators(fn.blocks, cfgSuccessors(fn.blocks))
	const defs = new Map<ValueId, Definition>()
	const define = (value: ValueId, def: Definition) => {
		if (defs.has(value)) fail(fn, `value %${value} is defined more than once`)
		defs.set(value, def)
	}

	for (const param of fn.params) define(param.value, { block: tree.entry, index: -1 })
	for (const block of fn.blocks) {
		for (const phi of block.phis) {
			if (phi.incoming.length !== block.preds.length) {
				fail(
					fn,
					`phi %${phi.dest} in bb${block.id} has ${phi.incoming.length} operand(s) for ${block.preds.length} predecessor(s)`
				)
			}
			phi.incoming.forEach((incoming, i) => {
				if (incoming.block !== block.preds[i]) {
					fail(fn, `phi %${phi.dest} in bb${block.id}: operand ${i} comes from bb${incoming.block}`)
				}
			})
			define(phi.dest, { block: block.id, index: -1 })
		}
		block.insts.forEach((inst, index) => {
			if (inst.kind === 'assign' && inst.dest !== null) define(inst.dest, { block: block.id, index })
		})
		const terminator = block.terminator
		if (terminator.kind === 'invoke' && terminator.dest !== null) {
			define(terminator.dest, { block: terminator.normal, index: -1 })
		}
	}

	const available = (value: ValueId, block: BlockId, index: number): boolean => {
		const def = defs.get(value)
		if (def === undefined) fail(fn, `value %${value} is never defined`)
		if (def.block === block) return def.index < index
		return tree.dominates(def.block, block)
	}

	for (const block of fn.blocks) {
		for (const phi of block.phis) {
			for (const incoming of phi.incoming) {
				const pred = fn.blocks.find((b) => b.id === incoming.block)
				const end = pred === undefined ? 0 : pred.insts.length
				for (const value of values([incoming.value])) {
					if (!available(value, incoming.block, end)) {
						fail(fn, `phi %${phi.dest} in bb${block.id} reads %${value}, not available at the end of bb${incoming.block}`)
					}
				}
			}
		}
		block.insts.forEach((inst, index) => {
			for (const value of values(instOperands(inst))) {
				if (!available(value, block.id, index)) fail(fn, `use of %${value} in bb${block.id} is not dominated by its definition`)
			}
		})
		for (const value of values(terminatorOperands(block.terminator))) {
			if (!available(value, block.id, block.insts.length)) {
				fail(fn, `terminator of bb${block.id} uses %${value} before its definition`)
			}
		}
	}
}
