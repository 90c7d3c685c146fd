/**
 * SSA construction.
 *
 * Phis are placed on the iterated dominance frontier of each variable's
 * definition sites, then a walk of the dominator tree renames every
 * definition to a fresh value and every use to the value reaching it.
 * Copies between variables of the same representation define no value:
 * the destination becomes another name for the source.
 *
 * A read of a source variable that is unassigned on some path reaching it
 * is reported as KLSSA001. Phis nobody reads are dropped afterwards, so a
 * variable assigned on only some paths is fine as long as it is not read
 * after the paths join.
 */

import type { PhpType } from '../check/types.ts'
import { NULL_CONST } from '../check/values.ts'
import {
	type BlockId,
	type CfgBlock,
	type CfgFunction,
	mapRvalue,
	type Operand,
	successors,
} from '../cfg/types.ts'
import type { CompilationContext } from '../core/context.ts'
import { InternalCompilerError } from '../core/errors.ts'
import type { SourceLocation } from '../core/location.ts'
import { irTypeOf } from '../ir/types.ts'
import { cfgSuccessors, computeDominators, dominanceFrontiers, iteratedFrontier } from './dominance.ts'
import {
	type Phi,
	type SsaBlock,
	type SsaFunction,
	type SsaInst,
	type SsaOperand,
	type SsaTerminator,
	type ValueId,
	valueOperand,
} from './types.ts'

interface PendingPhi {
	readonly dest: ValueId
	readonly type: PhpType
	readonly variable: string
	readonly incoming: Map<BlockId, SsaOperand | undefined>
}

interface Use {
	readonly value: ValueId
	readonly loc: SourceLocation
}

function isTemporary(name: string): boolean {
	return name.startsWith('%')
}

class SsaBuilder {
	private readonly byId: Map<BlockId, CfgBlock>
	private readonly stacks = new Map<string, SsaOperand[]>()
	private readonly phis = new Map<BlockId, PendingPhi[]>()
	private readonly values = new Map<ValueId, PhpType>()
	private readonly names = new Map<ValueId, string>()
	/** Invoke results, defined on entry to the invoke's normal successor */
	private readonly invokeResults = new Map<BlockId, { variable: string; value: SsaOperand }>()
	private readonly output = new Map<BlockId, SsaBlock>()
	private readonly uses: Use[] = []
	private readonly reported = new Set<string>()
	private nextValue = 0

	constructor(
		private readonly fn: CfgFunction,
		private readonly context: CompilationContext
	) {
		this.byId = new Map(fn.blocks.map((block) => [block.id, block]))
	}

	run(): SsaFunction {
		const tree = computeDominators(this.fn.blocks, cfgSuccessors(this.fn.blocks))
		this.placePhis(dominanceFrontiers(this.fn.blocks, tree))

		const params = this.fn.params.map((param) => {
			const value = this.define(param.name, param.type)
			this.push(param.name, valueOperand(value, param.type))
			return { name: param.name, type: param.type, value }
		})

		// Dominator-tree walk without recursion: `exit` frames pop the
		// definitions a block pushed once its subtree is done
		const work: ({ kind: 'enter'; block: BlockId } | { kind: 'exit'; pushed: readonly string[] })[] = [
			{ block: tree.entry, kind: 'enter' },
		]
		while (work.length > 0) {
			const item = work.pop()
			if (item === undefined) break
			if (item.kind === 'exit') {
				for (const name of item.pushed) this.stacks.get(name)?.pop()
				continue
			}
			const pushed = this.renameBlock(item.block)
			work.push({ kind: 'exit', pushed })
			const children = tree.children.get(item.block) ?? []
			for (const child of [...children].reverse()) work.push({ block: child, kind: 'enter' })
		}

		const phis = this.resolvePhis()
		const blocks = this.fn.blocks.map((block) => {
			const renamed = this.output.get(block.id)
			if (renamed === undefined) throw new InternalCompilerError('ssa', `block bb${block.id} was not renamed`)
			return { ...renamed, phis: phis.get(block.id) ?? [] }
		})
		return {
			blocks,
			loc: this.fn.loc,
			name: this.fn.name,
			names: this.names,
			params,
			returnType: this.fn.returnType,
			thisClass: this.fn.thisClass,
			unit: this.fn.unit,
			values: this.values,
		}
	}

	// ==========================================================================
	// Phi placement
	// ==========================================================================

	private placePhis(frontiers: Map<BlockId, Set<BlockId>>): void {
		const sites = new Map<string, Set<BlockId>>()
		const addSite = (name: string, block: BlockId) => {
			const set = sites.get(name) ?? new Set<BlockId>()
			set.add(block)
			sites.set(name, set)
		}
		const entry = this.fn.blocks[0]
		if (entry === undefined) return
		for (const param of this.fn.params) addSite(param.name, entry.id)
		for (const block of this.fn.blocks) {
			for (const inst of block.insts) {
				if (inst.kind === 'assign' && inst.dest !== null) addSite(inst.dest, block.id)
			}
			const terminator = block.terminator
			if (terminator.kind === 'invoke' && terminator.dest !== null) addSite(terminator.dest, terminator.normal)
		}
		for (const [name, defs] of sites) {
			const type = this.fn.locals.get(name)
			if (type === undefined) throw new InternalCompilerError('ssa', `variable ${name} has no type`)
			for (const join of iteratedFrontier(defs, frontiers)) {
				const list = this.phis.get(join) ?? []
				list.push({ dest: this.define(name, type), incoming: new Map(), type, variable: name })
				this.phis.set(join, list)
			}
		}
	}

	// ==========================================================================
	// Renaming
	// ==========================================================================

	private define(name: string, type: PhpType): ValueId {
		const id = this.nextValue++
		this.values.set(id, type)
		this.names.set(id, name)
		return id
	}

	private push(name: string, value: SsaOperand): void {
		const stack = this.stacks.get(name)
		if (stack === undefined) this.stacks.set(name, [value])
		else stack.push(value)
	}

	private current(name: string): SsaOperand | undefined {
		const stack = this.stacks.get(name)
		return stack === undefined ? undefined : stack[stack.length - 1]
	}

	private use(operand: Operand, loc: SourceLocation): SsaOperand {
		if (operand.kind === 'const') return operand
		const value = this.current(operand.name)
		if (value === undefined) {
			if (isTemporary(operand.name)) {
				throw new InternalCompilerError('ssa', `temporary ${operand.name} read before it is assigned in ${this.fn.name}`)
			}
			this.reportUndefined(operand.name, loc)
			return { kind: 'const', type: operand.type, value: NULL_CONST }
		}
		if (value.kind === 'value') this.uses.push({ loc, value: value.id })
		return value
	}

	private reportUndefined(name: string, loc: SourceLocation): void {
		const key = `${name}@${loc.line}:${loc.column}`
		if (this.reported.has(key)) return
		this.reported.add(key)
		this.context.emitAt('KLSSA001', loc, { name })
	}

	private renameBlock(id: BlockId): string[] {
		const block = this.byId.get(id)
		if (block === undefined) throw new InternalCompilerError('ssa', `missing block bb${id}`)
		const pushed: string[] = []
		const define = (name: string, value: SsaOperand) => {
			this.push(name, value)
			pushed.push(name)
		}

		const result = this.invokeResults.get(id)
		if (result !== undefined) define(result.variable, result.value)
		for (const phi of this.phis.get(id) ?? []) define(phi.variable, valueOperand(phi.dest, phi.type))

		const insts: SsaInst[] = []
		for (const inst of block.insts) {
			switch (inst.kind) {
				case 'assign': {
					const value = mapRvalue(inst.value, (operand) => this.use(operand, inst.loc))
					if (inst.dest === null) {
						insts.push({ ...inst, dest: null, value })
						break
					}
					if (value.kind === 'use' && irTypeOf(value.value.type) === irTypeOf(inst.type)) {
						define(inst.dest, value.value)
						break
					}
					const dest = this.define(inst.dest, inst.type)
					insts.push({ ...inst, dest, value })
					define(inst.dest, valueOperand(dest, inst.type))
					break
				}
				case 'propSet':
					insts.push({ ...inst, object: this.use(inst.object, inst.loc), value: this.use(inst.value, inst.loc) })
					break
				case 'echo':
					insts.push({ ...inst, value: this.use(inst.value, inst.loc) })
					break
			}
		}

		const terminator = this.renameTerminator(block)
		for (const edge of successors(terminator)) {
			for (const phi of this.phis.get(edge.target) ?? []) {
				phi.incoming.set(id, this.current(phi.variable))
			}
		}
		this.output.set(id, { id, insts, phis: [], preds: block.preds, terminator })
		return pushed
	}

	private renameTerminator(block: CfgBlock): SsaTerminator {
		const terminator = block.terminator
		switch (terminator.kind) {
			case 'jump':
			case 'unreachable':
				return terminator
			case 'branch':
				return { ...terminator, cond: this.use(terminator.cond, terminator.loc) }
			case 'return':
				return { ...terminator, value: terminator.value === null ? null : this.use(terminator.value, terminator.loc) }
			case 'throw':
				return { ...terminator, value: this.use(terminator.value, terminator.loc) }
			case 'invoke': {
				const value = mapRvalue(terminator.value, (operand) => this.use(operand, terminator.loc))
				if (terminator.dest === null) return { ...terminator, dest: null, value }
				const dest = this.define(terminator.dest, terminator.type)
				this.invokeResults.set(terminator.normal, {
					value: valueOperand(dest, terminator.type),
					variable: terminator.dest,
				})
				return { ...terminator, dest, value }
			}
		}
	}

	// ==========================================================================
	// Phi resolution
	// ==========================================================================

	/**
	 * Keep the phis something reads, report reads that may see an
	 * unassigned variable, and order incoming values by predecessor.
	 */
	private resolvePhis(): Map<BlockId, Phi[]> {
		const all = new Map<ValueId, { block: CfgBlock; phi: PendingPhi }>()
		for (const [blockId, list] of this.phis) {
			const block = this.byId.get(blockId)
			if (block === undefined) continue
			for (const phi of list) all.set(phi.dest, { block, phi })
		}

		const live = new Set<ValueId>()
		const work = this.uses.map((use) => use.value).filter((value) => all.has(value))
		while (work.length > 0) {
			const value = work.pop()
			if (value === undefined || live.has(value)) continue
			live.add(value)
			for (const incoming of all.get(value)?.phi.incoming.values() ?? []) {
				if (incoming?.kind === 'value' && all.has(incoming.id)) work.push(incoming.id)
			}
		}

		const undefinedOnSomePath = new Set<ValueId>()
		let changed = true
		while (changed) {
			changed = false
			for (const value of live) {
				if (undefinedOnSomePath.has(value)) continue
				const entry = all.get(value)
				if (entry === undefined) continue
				const incoming = entry.block.preds.map((pred) => entry.phi.incoming.get(pred))
				if (incoming.some((v) => v === undefined || (v.kind === 'value' && undefinedOnSomePath.has(v.id)))) {
					undefinedOnSomePath.add(value)
					changed = true
				}
			}
		}
		for (const use of this.uses) {
			if (!undefinedOnSomePath.has(use.value)) continue
			const variable = this.names.get(use.value) ?? '?'
			if (isTemporary(variable)) {
				throw new InternalCompilerError('ssa', `temporary ${variable} may be read before it is assigned in ${this.fn.name}`)
			}
			this.reportUndefined(variable, use.loc)
		}

		const result = new Map<BlockId, Phi[]>()
		for (const [blockId, list] of this.phis) {
			const block = this.byId.get(blockId)
			if (block === undefined) continue
			const kept = list
				.filter((phi) => live.has(phi.dest))
				.map((phi) => ({
					dest: phi.dest,
					incoming: block.preds.map((pred) => ({
						block: pred,
						value: phi.incoming.get(pred) ?? { kind: 'const' as const, type: phi.type, value: NULL_CONST },
					})),
					type: phi.type,
					variable: phi.variable,
				}))
			if (kept.length > 0) result.set(blockId, kept)
		}
		for (const value of all.keys()) {
			if (!live.has(value)) {
				this.values.delete(value)
				this.names.delete(value)
			}
		}
		return result
	}
}

/**
 * Build the SSA form of one function. Reads of possibly unassigned
 * variables are reported into `context`.
 */
export function buildSsa(fn: CfgFunction, context: CompilationContext): SsaFunction {
	return new SsaBuilder(fn, context).run()
}
