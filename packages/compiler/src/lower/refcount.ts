/**
 * Reference-count insertion.
 *
 * Every live handle value owns exactly one reference. A value is released
 * right after its last use; an instruction that consumes an operand the
 * function still needs gets an `rc_inc` first. Values that stay live
 * along one edge of a branch and die along the other are released at the
 * top of the successor that no longer needs them.
 *
 * Calls borrow their arguments. A call that unwinds out of the function,
 * or into a landing block, lists in `cleanup` the references the unwinder
 * releases on the way.
 */

import { type CallMayThrow, RUNTIME_FUNCTIONS } from '../ir/abi.ts'
import {
	type CallInst,
	type IrBlock,
	type IrFunction,
	type IrInst,
	type IrTerminator,
	instResult,
	irPredecessors,
	isHandle,
} from '../ir/types.ts'
import { splitCriticalEdges } from './edges.ts'

interface Operand {
	readonly value: number
	readonly consumed: boolean
}

function callOperands(call: CallInst): Operand[] {
	const consumes = call.callee.kind === 'direct' ? (RUNTIME_FUNCTIONS.get(call.callee.name)?.consumes ?? []) : []
	const operands: Operand[] = call.args.map((value, i) => ({ consumed: consumes.includes(i), value }))
	if (call.callee.kind === 'indirect') operands.push({ consumed: false, value: call.callee.value })
	return operands
}

function borrowed(...values: number[]): Operand[] {
	return values.map((value) => ({ consumed: false, value }))
}

function instUses(inst: IrInst): Operand[] {
	switch (inst.op) {
		case 'const':
		case 'object_new':
		case 'landingpad':
		case 'phi':
			return []
		case 'arith':
		case 'icmp':
		case 'fcmp':
			return borrowed(inst.left, inst.right)
		case 'unop':
		case 'cast':
			return borrowed(inst.operand)
		case 'call':
			return callOperands(inst)
		case 'vtable_load':
		case 'method_lookup':
		case 'field_load':
			return borrowed(inst.object)
		case 'field_store':
			return [
				{ consumed: false, value: inst.object },
				{ consumed: true, value: inst.value },
			]
		case 'instance_of':
		case 'rc_inc':
		case 'rc_dec':
			return borrowed(inst.value)
	}
}

class RefCounter {
	private readonly blocks: Map<number, IrBlock>
	private readonly preds: Map<number, number[]>
	private readonly liveIn = new Map<number, Set<number>>()

	constructor(
		private readonly fn: IrFunction,
		private readonly mayThrow: CallMayThrow
	) {
		this.blocks = new Map(fn.blocks.map((block) => [block.id, block]))
		this.preds = irPredecessors(fn)
	}

	run(): IrFunction {
		this.solve()
		return { ...this.fn, blocks: this.fn.blocks.map((block) => this.rewrite(block)) }
	}

	private handle(value: number): boolean {
		const type = this.fn.values.get(value)
		return type !== undefined && isHandle(type)
	}

	private handles(operands: readonly Operand[]): Operand[] {
		return operands.filter((operand) => this.handle(operand.value))
	}

	private live(block: number): ReadonlySet<number> {
		return this.liveIn.get(block) ?? new Set()
	}

	private phiResults(block: number): Set<number> {
		const phis = new Set<number>()
		for (const inst of this.blocks.get(block)?.insts ?? []) {
			if (inst.op === 'phi') phis.add(inst.result)
		}
		return phis
	}

	/** Phi operands flowing from `from` into `to`; consumed by the branch */
	private edgeOperands(from: number, to: number): Operand[] {
		const operands: Operand[] = []
		for (const inst of this.blocks.get(to)?.insts ?? []) {
			if (inst.op !== 'phi') continue
			for (const edge of inst.incoming) {
				if (edge.block === from) operands.push({ consumed: true, value: edge.value })
			}
		}
		return this.handles(operands)
	}

	private terminatorUses(block: IrBlock): Operand[] {
		const terminator = block.terminator
		switch (terminator.op) {
			case 'ret':
				return terminator.value === null ? [] : this.handles([{ consumed: true, value: terminator.value }])
			case 'raise':
				return this.handles([{ consumed: true, value: terminator.value }])
			case 'invoke':
				return this.handles(callOperands(terminator.call))
			case 'br':
				return this.edgeOperands(block.id, terminator.target)
			case 'condbr':
			case 'unreachable':
				return []
		}
	}

	/** Handles live right after the terminator, on any outgoing edge */
	private liveAfter(terminator: IrTerminator): Set<number> {
		switch (terminator.op) {
			case 'br': {
				const phis = this.phiResults(terminator.target)
				return new Set([...this.live(terminator.target)].filter((value) => !phis.has(value)))
			}
			case 'condbr':
				return new Set([...this.live(terminator.then), ...this.live(terminator.else)])
			case 'invoke':
				return new Set([...this.live(terminator.normal), ...this.live(terminator.unwind)])
			case 'raise':
				return new Set(terminator.unwind === null ? [] : this.live(terminator.unwind))
			case 'ret':
			case 'unreachable':
				return new Set()
		}
	}

	// ==========================================================================
	// Liveness
	// ==========================================================================

	private transfer(block: IrBlock): Set<number> {
		const live = this.liveAfter(block.terminator)
		if (block.terminator.op === 'invoke' && block.terminator.call.result !== null) {
			live.delete(block.terminator.call.result)
		}
		for (const use of this.terminatorUses(block)) live.add(use.value)
		for (let i = block.insts.length - 1; i >= 0; i--) {
			const inst = block.insts[i]
			if (inst === undefined) continue
			const result = instResult(inst)
			if (result !== null) live.delete(result)
			for (const use of this.handles(instUses(inst))) live.add(use.value)
		}
		return live
	}

	private solve(): void {
		const order = [...this.fn.blocks].reverse()
		let changed = true
		while (changed) {
			changed = false
			for (const block of order) {
				const next = this.transfer(block)
				const previous = this.live(block.id)
				if (next.size !== previous.size || [...next].some((value) => !previous.has(value))) {
					this.liveIn.set(block.id, next)
					changed = true
				}
			}
		}
	}

	// ==========================================================================
	// Insertion
	// ==========================================================================

	/**
	 * References held at the end of the single predecessor of `block` that
	 * `block` no longer needs.
	 */
	private edgeDrops(block: IrBlock): number[] {
		const preds = this.preds.get(block.id) ?? []
		const [pred] = preds
		if (preds.length !== 1 || pred === undefined) return []
		const terminator = this.blocks.get(pred)?.terminator
		if (terminator === undefined) return []
		let held: Set<number>
		if (terminator.op === 'condbr') {
			held = this.liveAfter(terminator)
		} else if (terminator.op === 'invoke' && terminator.normal === block.id) {
			held = this.heldAtCall(terminator, this.liveAfter(terminator))
			if (terminator.call.result !== null && this.handle(terminator.call.result)) held.add(terminator.call.result)
		} else {
			return []
		}
		const needed = this.live(block.id)
		return [...held].filter((value) => !needed.has(value))
	}

	/** References held while an invoke's call runs */
	private heldAtCall(terminator: Extract<IrTerminator, { op: 'invoke' }>, after: ReadonlySet<number>): Set<number> {
		const held = new Set(after)
		if (terminator.call.result !== null) held.delete(terminator.call.result)
		for (const use of this.handles(callOperands(terminator.call))) held.add(use.value)
		return held
	}

	private rewrite(block: IrBlock): IrBlock {
		const live = this.liveAfter(block.terminator)
		let terminator = block.terminator
		// Built back to front, reversed at the end
		const reversed: IrInst[] = []

		if (terminator.op === 'invoke') {
			const landing = this.live(terminator.unwind)
			const cleanup = [...this.heldAtCall(terminator, live)].filter((value) => !landing.has(value))
			terminator = { ...terminator, call: { ...terminator.call, cleanup } }
			if (terminator.call.result !== null) live.delete(terminator.call.result)
			for (const use of this.terminatorUses(block)) live.add(use.value)
		} else {
			for (const [value, count] of this.consumedCounts(this.terminatorUses(block))) {
				const incs = count + (live.has(value) ? 1 : 0) - 1
				for (let i = 0; i < incs; i++) reversed.push({ op: 'rc_inc', value })
				live.add(value)
			}
		}

		let firstNonPhi = 0
		while (block.insts[firstNonPhi]?.op === 'phi') firstNonPhi++

		for (let i = block.insts.length - 1; i >= firstNonPhi; i--) {
			const original = block.insts[i]
			if (original === undefined) continue
			const after: IrInst[] = []
			const before: IrInst[] = []
			const result = instResult(original)
			if (result !== null && this.handle(result)) {
				if (live.has(result)) live.delete(result)
				else after.push({ op: 'rc_dec', value: result })
			}

			let inst = original
			if (inst.op === 'call' && this.mayThrow(inst)) {
				const held = new Set(live)
				for (const use of this.handles(instUses(inst))) held.add(use.value)
				if (result !== null) held.delete(result)
				inst = { ...inst, cleanup: [...held] }
			}

			const uses = this.handles(instUses(inst))
			const consumed = this.consumedCounts(uses)
			for (const value of new Set(uses.map((use) => use.value))) {
				const keep = live.has(value)
				const borrowedHere = uses.some((use) => use.value === value && !use.consumed)
				const count = consumed.get(value) ?? 0
				if (count > 0) {
					const hold = keep || borrowedHere
					const incs = count + (hold ? 1 : 0) - 1
					for (let n = 0; n < incs; n++) before.push({ op: 'rc_inc', value })
					if (hold && !keep) after.push({ op: 'rc_dec', value })
				} else if (!keep) {
					after.push({ op: 'rc_dec', value })
				}
				live.add(value)
			}

			reversed.push(...after.reverse(), inst, ...before.reverse())
		}

		const top: IrInst[] = []
		const phis = block.insts.slice(0, firstNonPhi)
		for (const phi of phis) {
			const result = instResult(phi)
			if (result === null || !this.handle(result)) continue
			if (!live.has(result)) top.push({ op: 'rc_dec', value: result })
			live.delete(result)
		}
		for (const value of this.edgeDrops(block)) top.push({ op: 'rc_dec', value })
		if (block.id === this.fn.blocks[0]?.id) {
			for (const param of this.fn.params) {
				if (isHandle(param.type) && live.has(param.id)) top.push({ op: 'rc_inc', value: param.id })
			}
		}

		return { id: block.id, insts: [...phis, ...top, ...reversed.reverse()], terminator }
	}

	private consumedCounts(uses: readonly Operand[]): Map<number, number> {
		const counts = new Map<number, number>()
		for (const use of uses) {
			if (use.consumed) counts.set(use.value, (counts.get(use.value) ?? 0) + 1)
		}
		return counts
	}
}

/**
 * Insert `rc_inc`/`rc_dec` into a function lowered without reference
 * counts and fill in the cleanup lists of its calls.
 */
export function insertRefCounts(fn: IrFunction, mayThrow: CallMayThrow): IrFunction {
	return new RefCounter(splitCriticalEdges(fn), mayThrow).run()
}
