/**
 * Reference interpreter for IR modules.
 *
 * Executes lowered code against the counted heap, honouring every
 * `rc_inc`/`rc_dec` the compiler emitted. A run reports what the program
 * echoed, the exception that escaped it, and the cells still allocated
 * at exit: any leak or double free is a compiler bug.
 */

import type { CallInst, IrBlock, IrClass, IrExtern, IrFunction, IrInst, IrModule, IrType } from '../ir/types.ts'
import { type Cell, Heap, isCell, type ObjCell, type RtValue, RuntimeFault } from './heap.ts'
import { type Host, RUNTIME_LIBRARY } from './library.ts'
import { wrap } from './values.ts'

/** A program exception unwinding through the JavaScript stack; owns one reference */
export class PhpThrow extends Error {
	constructor(readonly exception: ObjCell) {
		super(`uncaught ${exception.cls.name}`)
		this.name = 'PhpThrow'
	}
}

/** Implementation of a foreign function, keyed by its symbol */
export type ForeignFunction = (args: readonly RtValue[], heap: Heap) => RtValue | undefined

export interface ExecuteOptions {
	/** Unit to run; defaults to the last module */
	readonly entry?: string
	/** Units run before the entry, the prelude among them */
	readonly preload?: readonly string[]
	readonly foreign?: ReadonlyMap<string, ForeignFunction>
	/** Receives output as the program echoes it */
	readonly onOutput?: (text: string) => void
	readonly maxSteps?: number
}

export interface UncaughtException {
	readonly className: string
	readonly message: string
}

export interface ExecutionResult {
	readonly output: string
	readonly uncaught: UncaughtException | null
	/** Cells allocated and never freed */
	readonly leaks: readonly string[]
	readonly allocated: number
}

const DEFAULT_MAX_STEPS = 10_000_000
const GET_MESSAGE = 'getmessage'
const CONSTRUCTOR = '__construct'

function describe(cell: Cell): string {
	return `${cell.kind} #${cell.id} (rc ${cell.rc})`
}

class Machine implements Host {
	readonly heap = new Heap()
	private readonly modules = new Map<string, IrModule>()
	private readonly functions = new Map<string, IrFunction>()
	private readonly blocks = new Map<IrFunction, Map<number, IrBlock>>()
	private readonly classes = new Map<string, IrClass>()
	private readonly externs = new Map<string, IrExtern>()
	private readonly loaded = new Set<string>()
	private readonly chunks: string[] = []
	private steps = 0

	constructor(
		modules: readonly IrModule[],
		private readonly options: ExecuteOptions
	) {
		for (const module of modules) {
			this.modules.set(module.name, module)
			for (const fn of module.functions) {
				this.functions.set(fn.name, fn)
				this.blocks.set(fn, new Map(fn.blocks.map((block) => [block.id, block])))
			}
			for (const cls of module.classes) this.classes.set(cls.name, cls)
			for (const ext of module.externs) this.externs.set(ext.name, ext)
		}
	}

	// ==========================================================================
	// Host
	// ==========================================================================

	echo(text: string): void {
		this.chunks.push(text)
		this.options.onOutput?.(text)
	}

	require(unit: string): void {
		if (this.loaded.has(unit)) return
		const module = this.modules.get(unit)
		if (module === undefined) throw new RuntimeFault(`unit ${unit} is not loaded`)
		this.loaded.add(unit)
		for (const dependency of module.requires) this.require(dependency)
		this.call(module.entry, [])
	}

	raise(className: string, message: string): never {
		const cls = this.classes.get(className)
		if (cls === undefined) throw new RuntimeFault(`built-in class ${className} is not loaded`)
		const object = this.heap.obj(cls)
		const constructor = cls.methods.get(CONSTRUCTOR)
		if (constructor !== undefined) {
			const text = this.heap.str(message)
			try {
				this.call(constructor, [object, text])
			} catch (error) {
				this.heap.release(object)
				throw error
			} finally {
				this.heap.release(text)
			}
		}
		throw new PhpThrow(object)
	}

	signature(name: string): readonly IrType[] {
		const fn = this.functions.get(name)
		if (fn === undefined) throw new RuntimeFault(`unknown function @${name}`)
		return fn.params.map((param) => param.type)
	}

	isInstance(cls: IrClass, className: string): boolean {
		let current: IrClass | undefined = cls
		while (current !== undefined) {
			if (current.name === className || current.interfaces.includes(className)) return true
			current = current.parent === null ? undefined : this.classes.get(current.parent)
		}
		return false
	}

	call(name: string, args: readonly RtValue[]): RtValue | undefined {
		const entry = RUNTIME_LIBRARY.get(name)
		if (entry !== undefined) return entry(this, args)
		const ext = this.externs.get(name)
		if (ext !== undefined) {
			const impl = this.options.foreign?.get(ext.symbol)
			if (impl === undefined) throw new RuntimeFault(`no implementation of foreign ${ext.symbol} from ${ext.library}`)
			return impl(args, this.heap)
		}
		const fn = this.functions.get(name)
		if (fn === undefined) throw new RuntimeFault(`call of unknown function @${name}`)
		return this.execute(fn, args)
	}

	// ==========================================================================
	// Frames
	// ==========================================================================

	private read(registers: Map<number, RtValue>, value: number): RtValue {
		const found = registers.get(value)
		if (found === undefined) throw new RuntimeFault(`read of undefined %${value}`)
		if (isCell(found)) this.heap.touch(found)
		return found
	}

	private cell(registers: Map<number, RtValue>, value: number): Cell {
		const found = this.read(registers, value)
		if (!isCell(found)) throw new RuntimeFault(`%${value} is not a handle`)
		return found
	}

	private object(registers: Map<number, RtValue>, value: number): ObjCell {
		const found = this.cell(registers, value)
		if (found.kind !== 'obj') throw new RuntimeFault(`%${value} is not an object`)
		return found
	}

	private int(registers: Map<number, RtValue>, value: number): bigint {
		const found = this.read(registers, value)
		if (typeof found !== 'bigint') throw new RuntimeFault(`%${value} is not an i64`)
		return found
	}

	private float(registers: Map<number, RtValue>, value: number): number {
		const found = this.read(registers, value)
		if (typeof found !== 'number') throw new RuntimeFault(`%${value} is not an f64`)
		return found
	}

	private bool(registers: Map<number, RtValue>, value: number): boolean {
		const found = this.read(registers, value)
		if (typeof found !== 'boolean') throw new RuntimeFault(`%${value} is not an i1`)
		return found
	}

	private invoke(call: CallInst, registers: Map<number, RtValue>): RtValue | undefined {
		const args = call.args.map((arg) => this.read(registers, arg))
		if (call.callee.kind === 'direct') return this.call(call.callee.name, args)
		const target = this.read(registers, call.callee.value)
		if (typeof target !== 'string') throw new RuntimeFault('indirect call through a non-function')
		return this.call(target, args)
	}

	private define(registers: Map<number, RtValue>, call: CallInst, result: RtValue | undefined): void {
		if (call.result === null) return
		if (result === undefined) throw new RuntimeFault(`call defining %${call.result} returned nothing`)
		registers.set(call.result, result)
	}

	private cleanup(registers: Map<number, RtValue>, values: readonly number[]): void {
		for (const value of values) this.heap.release(this.cell(registers, value))
	}

	private execute(fn: IrFunction, args: readonly RtValue[]): RtValue | undefined {
		if (args.length !== fn.params.length) {
			throw new RuntimeFault(`@${fn.name} takes ${fn.params.length} argument(s), got ${args.length}`)
		}
		const blocks = this.blocks.get(fn) ?? new Map<number, IrBlock>()
		const registers = new Map<number, RtValue>()
		fn.params.forEach((param, i) => {
			const value = args[i]
			if (value !== undefined) registers.set(param.id, value)
		})
		let block: IrBlock | undefined = fn.blocks[0]
		let previous: number | null = null
		let inFlight: ObjCell | null = null
		while (block !== undefined) {
			this.steps++
			if (this.steps > (this.options.maxSteps ?? DEFAULT_MAX_STEPS)) throw new RuntimeFault('step limit exceeded')
			const from = previous
			const incoming: [number, RtValue][] = []
			for (const inst of block.insts) {
				if (inst.op !== 'phi') break
				const edge = inst.incoming.find((candidate) => candidate.block === from)
				if (edge === undefined) throw new RuntimeFault(`phi %${inst.result} has no operand for bb${from}`)
				incoming.push([inst.result, this.read(registers, edge.value)])
			}
			for (const [result, value] of incoming) registers.set(result, value)
			for (const inst of block.insts.slice(incoming.length)) {
				if (inst.op === 'landingpad') {
					if (inFlight === null) throw new RuntimeFault('landingpad without an exception in flight')
					registers.set(inst.result, inFlight)
					inFlight = null
					continue
				}
				this.instruction(inst, registers)
			}
			let next: number
			const terminator = block.terminator
			switch (terminator.op) {
				case 'ret':
					return terminator.value === null ? undefined : this.read(registers, terminator.value)
				case 'br':
					next = terminator.target
					break
				case 'condbr':
					next = this.bool(registers, terminator.cond) ? terminator.then : terminator.else
					break
				case 'invoke':
					try {
						this.define(registers, terminator.call, this.invoke(terminator.call, registers))
						next = terminator.normal
					} catch (error) {
						if (!(error instanceof PhpThrow)) throw error
						this.cleanup(registers, terminator.call.cleanup)
						inFlight = error.exception
						next = terminator.unwind
					}
					break
				case 'raise': {
					const exception = this.object(registers, terminator.value)
					if (terminator.unwind === null) throw new PhpThrow(exception)
					inFlight = exception
					next = terminator.unwind
					break
				}
				case 'unreachable':
					throw new RuntimeFault(`@${fn.name} reached unreachable code`)
			}
			previous = block.id
			block = blocks.get(next)
		}
		throw new RuntimeFault(`@${fn.name} jumped to a missing block`)
	}

	// ==========================================================================
	// Instructions
	// ==========================================================================

	private constant(inst: Extract<IrInst, { op: 'const' }>): RtValue {
		const { type, value } = inst
		if (type === 'box' && value === null) return this.heap.box({ t: 'null' })
		if (type === 'str' && typeof value === 'string') return this.heap.str(value)
		if (type === 'fn' && typeof value === 'string') return value
		if (type === 'i64' && typeof value === 'bigint') return value
		if (type === 'f64' && typeof value === 'number') return value
		if (type === 'i1' && typeof value === 'boolean') return value
		throw new RuntimeFault(`malformed ${type} constant`)
	}

	private arith(inst: Extract<IrInst, { op: 'arith' }>, registers: Map<number, RtValue>): RtValue {
		const left = this.read(registers, inst.left)
		const right = this.read(registers, inst.right)
		if (typeof left === 'boolean' && typeof right === 'boolean') {
			if (inst.kind === 'and') return left && right
			if (inst.kind === 'or') return left || right
			if (inst.kind === 'xor') return left !== right
		}
		if (typeof left === 'number' && typeof right === 'number') {
			switch (inst.kind) {
				case 'fadd':
					return left + right
				case 'fsub':
					return left - right
				case 'fmul':
					return left * right
				case 'fdiv':
					return left / right
			}
		}
		if (typeof left !== 'bigint' || typeof right !== 'bigint') throw new RuntimeFault(`${inst.kind} on mismatched operands`)
		switch (inst.kind) {
			case 'add':
				return wrap(left + right)
			case 'sub':
				return wrap(left - right)
			case 'mul':
				return wrap(left * right)
			case 'sdiv':
				if (right === 0n) throw new RuntimeFault('sdiv by zero')
				return wrap(left / right)
			case 'srem':
				if (right === 0n) throw new RuntimeFault('srem by zero')
				return left % right
			case 'and':
				return left & right
			case 'or':
				return left | right
			case 'xor':
				return left ^ right
			default:
				throw new RuntimeFault(`${inst.kind} on i64 operands`)
		}
	}

	private icmp(inst: Extract<IrInst, { op: 'icmp' }>, registers: Map<number, RtValue>): boolean {
		const left = this.read(registers, inst.left)
		const right = this.read(registers, inst.right)
		const toInt = (value: RtValue): bigint => {
			if (typeof value === 'bigint') return value
			if (typeof value === 'boolean') return value ? 1n : 0n
			throw new RuntimeFault('icmp on a non-integer')
		}
		const a = toInt(left)
		const b = toInt(right)
		switch (inst.predicate) {
			case 'eq':
				return a === b
			case 'ne':
				return a !== b
			case 'slt':
				return a < b
			case 'sle':
				return a <= b
			case 'sgt':
				return a > b
			case 'sge':
				return a >= b
		}
	}

	private fcmp(inst: Extract<IrInst, { op: 'fcmp' }>, registers: Map<number, RtValue>): boolean {
		const a = this.float(registers, inst.left)
		const b = this.float(registers, inst.right)
		switch (inst.predicate) {
			case 'oeq':
				return a === b
			case 'une':
				return !(a === b)
			case 'olt':
				return a < b
			case 'ole':
				return a <= b
			case 'ogt':
				return a > b
			case 'oge':
				return a >= b
		}
	}

	private unary(inst: Extract<IrInst, { op: 'unop' }>, registers: Map<number, RtValue>): RtValue {
		switch (inst.kind) {
			case 'not':
				return !this.bool(registers, inst.operand)
			case 'neg':
				return wrap(-this.int(registers, inst.operand))
			case 'fneg':
				return -this.float(registers, inst.operand)
			case 'bitnot':
				return ~this.int(registers, inst.operand)
		}
	}

	private instruction(inst: IrInst, registers: Map<number, RtValue>): void {
		switch (inst.op) {
			case 'const':
				registers.set(inst.result, this.constant(inst))
				return
			case 'arith':
				registers.set(inst.result, this.arith(inst, registers))
				return
			case 'icmp':
				registers.set(inst.result, this.icmp(inst, registers))
				return
			case 'fcmp':
				registers.set(inst.result, this.fcmp(inst, registers))
				return
			case 'unop':
				registers.set(inst.result, this.unary(inst, registers))
				return
			case 'cast':
				registers.set(
					inst.result,
					inst.kind === 'sitofp'
						? Number(this.int(registers, inst.operand))
						: this.bool(registers, inst.operand)
							? 1n
							: 0n
				)
				return
			case 'call':
				try {
					this.define(registers, inst, this.invoke(inst, registers))
				} catch (error) {
					if (error instanceof PhpThrow) this.cleanup(registers, inst.cleanup)
					throw error
				}
				return
			case 'vtable_load': {
				const implementation = this.object(registers, inst.object).cls.vtable[inst.slot]
				if (implementation === undefined) throw new RuntimeFault(`vtable slot ${inst.slot} is empty`)
				registers.set(inst.result, implementation)
				return
			}
			case 'method_lookup': {
				const { cls } = this.object(registers, inst.object)
				const implementation = cls.methods.get(inst.method.toLowerCase())
				if (implementation === undefined) throw new RuntimeFault(`${cls.name} has no method ${inst.method}`)
				registers.set(inst.result, implementation)
				return
			}
			case 'field_load': {
				const value = this.object(registers, inst.object).slots[inst.slot]
				if (value === undefined) throw new RuntimeFault(`read of uninitialized ${inst.className} slot ${inst.slot}`)
				if (isCell(value)) this.heap.retain(value)
				registers.set(inst.result, value)
				return
			}
			case 'field_store': {
				const object = this.object(registers, inst.object)
				const previous = object.slots[inst.slot]
				object.slots[inst.slot] = this.read(registers, inst.value)
				if (isCell(previous)) this.heap.release(previous)
				return
			}
			case 'object_new': {
				const cls = this.classes.get(inst.className)
				if (cls === undefined) throw new RuntimeFault(`unknown class ${inst.className}`)
				registers.set(inst.result, this.heap.obj(cls))
				return
			}
			case 'instance_of':
				registers.set(inst.result, this.isInstance(this.object(registers, inst.value).cls, inst.className))
				return
			case 'rc_inc':
				this.heap.retain(this.cell(registers, inst.value))
				return
			case 'rc_dec':
				this.heap.release(this.cell(registers, inst.value))
				return
			case 'landingpad':
			case 'phi':
				throw new RuntimeFault(`${inst.op} below the top of a block`)
		}
	}

	// ==========================================================================
	// Runs
	// ==========================================================================

	private messageOf(exception: ObjCell): string {
		const getter = exception.cls.methods.get(GET_MESSAGE)
		if (getter === undefined) return ''
		const text = this.call(getter, [exception])
		if (!isCell(text) || text.kind !== 'str') return ''
		const message = text.value
		this.heap.release(text)
		return message
	}

	run(entry: string): ExecutionResult {
		let uncaught: UncaughtException | null = null
		try {
			for (const unit of this.options.preload ?? []) this.require(unit)
			this.require(entry)
		} catch (error) {
			if (!(error instanceof PhpThrow)) throw error
			uncaught = { className: error.exception.cls.name, message: this.messageOf(error.exception) }
			this.heap.release(error.exception)
		}
		return {
			allocated: this.heap.allocated,
			leaks: this.heap.leaks().map(describe),
			output: this.chunks.join(''),
			uncaught,
		}
	}
}

/**
 * Run the top-level code of a unit and everything it requires. Faults
 * of the machine itself surface as `RuntimeFault`.
 */
export function execute(modules: readonly IrModule[], options: ExecuteOptions = {}): ExecutionResult {
	const entry = options.entry ?? modules[modules.length - 1]?.name
	if (entry === undefined) throw new RuntimeFault('nothing to run')
	return new Machine(modules, options).run(entry)
}
