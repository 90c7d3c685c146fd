/**
 * IR validator.
 *
 * Structural checks on a lowered function: targets exist, phis sit at
 * block tops with one operand per predecessor, landing blocks are entered
 * only by unwinding, operand types agree with the instruction, and every
 * use is dominated by its definition. Failures are compiler bugs.
 */

import { InternalCompilerError } from '../core/errors.ts'
import { computeDominators } from '../ssa/dominance.ts'
import { RUNTIME_FUNCTIONS } from './abi.ts'
import {
	type CallInst,
	type IrFunction,
	type IrInst,
	type IrModule,
	type IrType,
	instOperands,
	instResult,
	irGraph,
	irPredecessors,
	terminatorOperands,
} from './types.ts'

interface Site {
	readonly block: number
	/** -1 for values defined on entry to the block */
	readonly index: number
}

class Validator {
	private readonly defs = new Map<number, Site>()

	constructor(
		private readonly fn: IrFunction,
		private readonly functions: ReadonlyMap<string, IrFunction>
	) {}

	private fail(message: string): never {
		throw new InternalCompilerError('ir-validate', `@${this.fn.name}: ${message}`)
	}

	private typeOf(value: number): IrType {
		const type = this.fn.values.get(value)
		if (type === undefined) this.fail(`value %${value} has no type`)
		return type
	}

	private expect(value: number, type: IrType, what: string): void {
		const actual = this.typeOf(value)
		if (actual !== type) this.fail(`${what}: %${value} is ${actual}, expected ${type}`)
	}

	private define(value: number, site: Site): void {
		if (this.defs.has(value)) this.fail(`value %${value} is defined more than once`)
		this.defs.set(value, site)
	}

	run(): void {
		const { fn } = this
		const entry = fn.blocks[0]
		if (entry === undefined) this.fail('no blocks')
		const ids = new Set<number>()
		for (const block of fn.blocks) {
			if (ids.has(block.id)) this.fail(`duplicate block bb${block.id}`)
			ids.add(block.id)
		}
		const preds = irPredecessors(fn)
		if ((preds.get(entry.id)?.length ?? 0) > 0) this.fail('entry block has predecessors')

		const unwindTargets = new Set<number>()
		const normalTargets = new Set<number>()
		for (const block of fn.blocks) {
			const terminator = block.terminator
			const targets: number[] = []
			switch (terminator.op) {
				case 'br':
					targets.push(terminator.target)
					normalTargets.add(terminator.target)
					break
				case 'condbr':
					targets.push(terminator.then, terminator.else)
					normalTargets.add(terminator.then).add(terminator.else)
					break
				case 'invoke':
					targets.push(terminator.normal, terminator.unwind)
					normalTargets.add(terminator.normal)
					unwindTargets.add(terminator.unwind)
					break
				case 'raise':
					if (terminator.unwind !== null) {
						targets.push(terminator.unwind)
						unwindTargets.add(terminator.unwind)
					}
					break
			}
			for (const target of targets) if (!ids.has(target)) this.fail(`bb${block.id} jumps to missing bb${target}`)
		}
		for (const target of unwindTargets) {
			if (normalTargets.has(target)) this.fail(`bb${target} is both a landing block and a normal successor`)
			const first = fn.blocks.find((block) => block.id === target)?.insts[0]
			if (first?.op !== 'landingpad') this.fail(`landing block bb${target} does not start with landingpad`)
		}

		for (const param of fn.params) {
			this.expect(param.id, param.type, `parameter $${param.name}`)
			this.define(param.id, { block: entry.id, index: -1 })
		}
		for (const block of fn.blocks) {
			let inPhis = true
			block.insts.forEach((inst, index) => {
				if (inst.op === 'phi') {
					if (!inPhis) this.fail(`phi %${inst.result} in bb${block.id} follows other instructions`)
					const blockPreds = preds.get(block.id) ?? []
					const from = inst.incoming.map((edge) => edge.block)
					if (from.length !== blockPreds.length || blockPreds.some((pred) => !from.includes(pred))) {
						this.fail(`phi %${inst.result} in bb${block.id} does not match predecessors`)
					}
					for (const edge of inst.incoming) this.expect(edge.value, inst.type, `phi %${inst.result}`)
				} else {
					inPhis = false
				}
				if (inst.op === 'landingpad' && (index !== 0 || !unwindTargets.has(block.id))) {
					this.fail(`landingpad outside the top of a landing block in bb${block.id}`)
				}
				const result = instResult(inst)
				if (result !== null) {
					this.define(result, { block: block.id, index })
					if ('type' in inst) this.expect(result, inst.type, inst.op)
				}
				this.checkTypes(inst)
			})
			const terminator = block.terminator
			switch (terminator.op) {
				case 'ret':
					if (terminator.value === null) {
						if (fn.returnType !== 'void') this.fail(`bb${block.id} returns nothing from a ${fn.returnType} function`)
					} else {
						this.expect(terminator.value, fn.returnType, 'ret')
					}
					break
				case 'condbr':
					this.expect(terminator.cond, 'i1', 'condbr')
					break
				case 'raise':
					this.expect(terminator.value, 'obj', 'raise')
					break
				case 'invoke':
					this.checkCall(terminator.call)
					if (terminator.call.result !== null) {
						this.define(terminator.call.result, { block: terminator.normal, index: -1 })
					}
					break
			}
		}
		this.checkDominance()
	}

	private checkTypes(inst: IrInst): void {
		switch (inst.op) {
			case 'arith':
				this.expect(inst.left, inst.type, inst.kind)
				this.expect(inst.right, inst.type, inst.kind)
				break
			case 'icmp': {
				const type = this.typeOf(inst.left)
				if (type !== 'i64' && type !== 'i1') this.fail(`icmp on ${type}`)
				this.expect(inst.right, type, 'icmp')
				break
			}
			case 'fcmp':
				this.expect(inst.left, 'f64', 'fcmp')
				this.expect(inst.right, 'f64', 'fcmp')
				break
			case 'vtable_load':
			case 'method_lookup':
			case 'field_load':
			case 'field_store':
				this.expect(inst.object, 'obj', inst.op)
				break
			case 'instance_of':
				this.expect(inst.value, 'obj', 'instance_of')
				break
			case 'call':
				this.checkCall(inst)
				break
		}
	}

	private checkCall(call: CallInst): void {
		if (call.callee.kind === 'indirect') {
			this.expect(call.callee.value, 'fn', 'indirect call')
			return
		}
		const name = call.callee.name
		const runtime = RUNTIME_FUNCTIONS.get(name)
		const target = this.functions.get(name)
		const params = runtime?.params ?? target?.params.map((param) => param.type)
		if (params === undefined) return
		const variadic = runtime?.variadic ?? null
		if (call.args.length < params.length || (variadic === null && call.args.length > params.length)) {
			this.fail(`@${name} called with ${call.args.length} argument(s)`)
		}
		call.args.forEach((arg, i) => {
			const expected = params[i] ?? variadic
			if (expected !== null) this.expect(arg, expected, `argument ${i} of @${name}`)
		})
	}

	private checkDominance(): void {
		const graph = irGraph(this.fn)
		const tree = computeDominators(graph.blocks, graph.next)
		const available = (value: number, block: number, index: number): boolean => {
			const def = this.defs.get(value)
			if (def === undefined) this.fail(`%${value} is used but never defined`)
			if (def.block === block) return def.index < index
			return tree.dominates(def.block, block)
		}
		for (const block of this.fn.blocks) {
			block.insts.forEach((inst, index) => {
				if (inst.op === 'phi') {
					for (const edge of inst.incoming) {
						const pred = this.fn.blocks.find((b) => b.id === edge.block)
						if (!available(edge.value, edge.block, pred?.insts.length ?? 0)) {
							this.fail(`phi %${inst.result} reads %${edge.value}, not available at the end of bb${edge.block}`)
						}
					}
					return
				}
				for (const value of instOperands(inst)) {
					if (!available(value, block.id, index)) this.fail(`use of %${value} in bb${block.id} is not dominated`)
				}
			})
			for (const value of terminatorOperands(block.terminator)) {
				if (!available(value, block.id, block.insts.length)) {
					this.fail(`terminator of bb${block.id} uses %${value} before its definition`)
				}
			}
		}
	}
}

export function validateFunction(fn: IrFunction, functions: ReadonlyMap<string, IrFunction> = new Map()): void {
	new Validator(fn, functions).run()
}

export function validateModule(module: IrModule): void {
	const functions = new Map(module.functions.map((fn) => [fn.name, fn]))
	for (const fn of module.functions) validateFunction(fn, functions)
}
