/**
 * Reference-count simulation.
 *
 * Walks a function with an abstract count per handle value: one for each
 * reference the function owns. A definition owns one, `rc_inc` adds one,
 * `rc_dec` and consuming uses take one away. Parameters start borrowed at
 * zero. The walk reports
 *
 * - uses and releases of a value the function holds no reference to
 * - references still held when the function returns or unwinds out
 * - paths that meet holding different counts of the same value, or any
 *   count of a value the meeting block cannot see
 */

import { InternalCompilerError } from '../core/errors.ts'
import { computeDominators } from '../ssa/dominance.ts'
import { type CallMayThrow, RUNTIME_FUNCTIONS } from './abi.ts'
import {
	type CallInst,
	type IrBlock,
	type IrFunction,
	type IrInst,
	instResult,
	irGraph,
	isHandle,
} from './types.ts'

type Counts = Map<number, number>

interface Use {
	readonly value: number
	readonly consumed: boolean
}

function callUses(call: CallInst): Use[] {
	const consumes = call.callee.kind === 'direct' ? (RUNTIME_FUNCTIONS.get(call.callee.name)?.consumes ?? []) : []
	return call.args.map((value, i) => ({ consumed: consumes.includes(i), value }))
}

function uses(inst: IrInst): Use[] {
	switch (inst.op) {
		case 'call':
			return callUses(inst)
		case 'field_load':
		case 'vtable_load':
		case 'method_lookup':
			return [{ consumed: false, value: inst.object }]
		case 'field_store':
			return [
				{ consumed: false, value: inst.object },
				{ consumed: true, value: inst.value },
			]
		case 'instance_of':
			return [{ consumed: false, value: inst.value }]
		default:
			return []
	}
}

function same(a: Counts, b: Counts): boolean {
	const nonZero = (counts: Counts) => [...counts].filter(([, n]) => n !== 0)
	const left = nonZero(a)
	const right = nonZero(b)
	return left.length === right.length && left.every(([value, n]) => b.get(value) === n)
}

class Simulation {
	readonly problems: string[] = []
	private readonly params: Set<number>
	private readonly defBlock = new Map<number, number>()
	private readonly entryState = new Map<number, Counts>()
	private readonly blocks: Map<number, IrBlock>
	private readonly dominates: (a: number, b: number) => boolean
	private readonly work: number[] = []

	constructor(
		private readonly fn: IrFunction,
		private readonly mayThrow: CallMayThrow
	) {
		this.blocks = new Map(fn.blocks.map((block) => [block.id, block]))
		this.params = new Set(fn.params.filter((param) => isHandle(param.type)).map((param) => param.id))
		const graph = irGraph(fn)
		const tree = computeDominators(graph.blocks, graph.next)
		this.dominates = (a, b) => tree.dominates(a, b)
		const entry = fn.blocks[0]
		for (const param of fn.params) if (entry !== undefined) this.defBlock.set(param.id, entry.id)
		for (const block of fn.blocks) {
			for (const inst of block.insts) {
				const result = instResult(inst)
				if (result !== null) this.defBlock.set(result, block.id)
			}
			const terminator = block.terminator
			if (terminator.op === 'invoke' && terminator.call.result !== null) {
				this.defBlock.set(terminator.call.result, terminator.normal)
			}
		}
	}

	private handle(value: number): boolean {
		const type = this.fn.values.get(value)
		return type !== undefined && isHandle(type)
	}

	private report(where: string, message: string): void {
		this.problems.push(`@${this.fn.name} ${where}: ${message}`)
	}

	run(): string[] {
		const entry = this.fn.blocks[0]
		if (entry === undefined) return this.problems
		this.entryState.set(entry.id, new Map([...this.params].map((param) => [param, 0])))
		this.work.push(entry.id)
		const done = new Set<number>()
		while (this.work.length > 0) {
			const id = this.work.shift()
			if (id === undefined || done.has(id)) continue
			done.add(id)
			const block = this.blocks.get(id)
			const state = this.entryState.get(id)
			if (block !== undefined && state !== undefined) this.block(block, new Map(state))
		}
		return this.problems
	}

	// ==========================================================================
	// Transfer
	// ==========================================================================

	private use(counts: Counts, value: number, where: string): void {
		if (!this.handle(value)) return
		if ((counts.get(value) ?? 0) < 1) this.report(where, `%${value} used without a reference`)
	}

	private take(counts: Counts, value: number, where: string, what: string): void {
		if (!this.handle(value)) return
		const n = counts.get(value) ?? 0
		if (n < 1) {
			this.report(where, `%${value} ${what} without a reference`)
			return
		}
		counts.set(value, n - 1)
	}

	private inst(counts: Counts, inst: IrInst, where: string): void {
		switch (inst.op) {
			case 'rc_inc': {
				const n = counts.get(inst.value) ?? 0
				if (n < 1 && !this.params.has(inst.value)) this.report(where, `rc_inc of released %${inst.value}`)
				counts.set(inst.value, n + 1)
				return
			}
			case 'rc_dec':
				this.take(counts, inst.value, where, 'released')
				return
			case 'phi':
				if (this.handle(inst.result)) counts.set(inst.result, 1)
				return
		}
		const operands = uses(inst)
		for (const operand of operands) this.use(counts, operand.value, where)
		if (inst.op === 'call' && this.mayThrow(inst)) this.unwindOut(counts, inst.cleanup, `${where} (unwinding)`)
		for (const operand of operands) {
			if (operand.consumed) this.take(counts, operand.value, where, 'consumed')
		}
		const result = instResult(inst)
		if (result !== null && this.handle(result)) counts.set(result, 1)
	}

	private release(counts: Counts, cleanup: readonly number[], where: string): Counts {
		const after = new Map(counts)
		for (const value of cleanup) this.take(after, value, where, 'cleaned up')
		return after
	}

	private unwindOut(counts: Counts, cleanup: readonly number[], where: string): void {
		this.expectEmpty(this.release(counts, cleanup, where), where)
	}

	private expectEmpty(counts: Counts, where: string): void {
		for (const [value, n] of counts) {
			if (n !== 0) this.report(where, `%${value} still holds ${n} reference(s)`)
		}
	}

	private block(block: IrBlock, counts: Counts): void {
		block.insts.forEach((inst, i) => this.inst(counts, inst, `bb${block.id}:${i}`))
		const where = `bb${block.id}:end`
		const terminator = block.terminator
		switch (terminator.op) {
			case 'br':
				for (const inst of this.blocks.get(terminator.target)?.insts ?? []) {
					if (inst.op !== 'phi') continue
					for (const edge of inst.incoming) {
						if (edge.block === block.id) this.take(counts, edge.value, where, 'passed to a phi')
					}
				}
				this.flow(block.id, terminator.target, counts)
				return
			case 'condbr':
				this.flow(block.id, terminator.then, counts)
				this.flow(block.id, terminator.else, counts)
				return
			case 'invoke': {
				for (const use of callUses(terminator.call)) this.use(counts, use.value, where)
				this.flow(block.id, terminator.unwind, this.release(counts, terminator.call.cleanup, where))
				const normal = new Map(counts)
				for (const use of callUses(terminator.call)) {
					if (use.consumed) this.take(normal, use.value, where, 'consumed')
				}
				this.flow(block.id, terminator.normal, normal, terminator.call.result)
				return
			}
			case 'raise':
				this.take(counts, terminator.value, where, 'raised')
				if (terminator.unwind === null) this.expectEmpty(counts, `${where} (raise)`)
				else this.flow(block.id, terminator.unwind, counts)
				return
			case 'ret':
				if (terminator.value !== null) this.take(counts, terminator.value, where, 'returned')
				this.expectEmpty(counts, `${where} (ret)`)
				return
			case 'unreachable':
				return
		}
	}

	private flow(from: number, to: number, counts: Counts, result: number | null = null): void {
		const kept: Counts = new Map()
		for (const [value, n] of counts) {
			const def = this.defBlock.get(value)
			const visible = def !== undefined && def !== to && this.dominates(def, to)
			if (visible) kept.set(value, n)
			else if (n !== 0) this.report(`bb${from}->bb${to}`, `%${value} still holds ${n} reference(s) on an edge where it is out of scope`)
		}
		if (result !== null && this.handle(result)) kept.set(result, 1)
		const previous = this.entryState.get(to)
		if (previous === undefined) {
			this.entryState.set(to, kept)
			this.work.push(to)
		} else if (!same(previous, kept)) {
			this.report(`bb${from}->bb${to}`, 'paths meet with different reference counts')
		}
	}
}

/** Problems found by the simulation; empty when every count balances */
export function simulateRefCounts(fn: IrFunction, mayThrow: CallMayThrow): string[] {
	return new Simulation(fn, mayThrow).run()
}

export function verifyRefCounts(fn: IrFunction, mayThrow: CallMayThrow): void {
	const problems = simulateRefCounts(fn, mayThrow)
	if (problems.length > 0) throw new InternalCompilerError('refcheck', problems.join('; '))
}
