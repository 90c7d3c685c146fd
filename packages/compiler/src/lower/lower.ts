/**
 * IR lowering.
 *
 * Maps each SSA operation to typed IR instructions. Source operators pick
 * their machine operation from the operand type the checker recorded;
 * everything the machine has no instruction for becomes a call into the
 * runtime library. Division and modulo get an explicit zero test that
 * raises DivisionByZeroError.
 *
 * The output carries no reference-count operations yet: every handle an
 * instruction defines is owned, call arguments are borrowed, and the
 * runtime entries listed as consuming take over their argument. Reference
 * counts are inserted afterwards (see refcount.ts).
 */

import { CONSTRUCTOR } from '../check/declarations.ts'
import type { ClassSymbol, FunctionSymbol, SymbolTable } from '../check/symbols.ts'
import type { ResolvedUnit, TypedBinaryOp } from '../check/typed.ts'
import { unitMainName } from '../check/typed.ts'
import { FLOAT, INT, MIXED, type PhpType, STRING } from '../check/types.ts'
import { type ConstValue, constType, stringConst } from '../check/values.ts'
import type { BlockId, Rvalue } from '../cfg/types.ts'
import { InternalCompilerError, invariant } from '../core/errors.ts'
import { runtimeFunction } from '../ir/abi.ts'
import {
	type ArithOp,
	type CallInst,
	type Callee,
	type Effect,
	type FcmpPredicate,
	type IcmpPredicate,
	type IrBlock,
	type IrClass,
	type IrExtern,
	type IrFunction,
	type IrInst,
	type IrModule,
	type IrTerminator,
	type IrType,
	irTypeOf,
	type PhiIncoming,
	terminatorSuccessors,
} from '../ir/types.ts'
import type { ResolvedOptions } from '../pipeline/options.ts'
import { cfgSuccessors, reversePostorder } from '../ssa/dominance.ts'
import type { SsaBlock, SsaFunction, SsaOperand, ValueId } from '../ssa/types.ts'

interface MutableBlock {
	readonly id: number
	readonly insts: IrInst[]
	terminator: IrTerminator | null
}

interface PendingPhi {
	readonly block: BlockId
	readonly result: number
	readonly type: PhpType
	readonly incoming: readonly { block: BlockId; value: SsaOperand }[]
}

const BOX: Partial<Record<IrType, string>> = {
	arr: 'rt_box_arr',
	f64: 'rt_box_float',
	i1: 'rt_box_bool',
	i64: 'rt_box_int',
	obj: 'rt_box_obj',
	str: 'rt_box_str',
}

const UNBOX: Partial<Record<IrType, string>> = {
	arr: 'rt_unbox_arr',
	f64: 'rt_unbox_float',
	i1: 'rt_unbox_bool',
	i64: 'rt_unbox_int',
	str: 'rt_unbox_str',
}

/** Lenient conversions of explicit casts out of `mixed` */
const CAST: Partial<Record<IrType, string>> = {
	arr: 'rt_to_arr',
	f64: 'rt_to_float',
	i1: 'rt_to_bool',
	i64: 'rt_to_int',
	str: 'rt_to_str',
}

const SCALAR_TO_STRING: Partial<Record<IrType, string>> = {
	f64: 'rt_float_to_str',
	i1: 'rt_bool_to_str',
	i64: 'rt_int_to_str',
}

const STRING_TO_SCALAR: Partial<Record<IrType, string>> = {
	f64: 'rt_str_to_float',
	i1: 'rt_str_to_bool',
	i64: 'rt_str_to_int',
}

const INT_ARITH: Partial<Record<TypedBinaryOp, ArithOp>> = {
	add: 'add',
	bitAnd: 'and',
	bitOr: 'or',
	bitXor: 'xor',
	mul: 'mul',
	sub: 'sub',
}

const FLOAT_ARITH: Partial<Record<TypedBinaryOp, ArithOp>> = {
	add: 'fadd',
	mul: 'fmul',
	sub: 'fsub',
}

const MIXED_ARITH: Partial<Record<TypedBinaryOp, string>> = {
	add: 'rt_mixed_add',
	div: 'rt_mixed_div',
	mul: 'rt_mixed_mul',
	pow: 'rt_mixed_pow',
	sub: 'rt_mixed_sub',
}

type Comparison = 'eq' | 'ne' | 'lt' | 'le' | 'gt' | 'ge'

const ICMP: Record<Comparison, IcmpPredicate> = { eq: 'eq', ge: 'sge', gt: 'sgt', le: 'sle', lt: 'slt', ne: 'ne' }
const FCMP: Record<Comparison, FcmpPredicate> = { eq: 'oeq', ge: 'oge', gt: 'ogt', le: 'ole', lt: 'olt', ne: 'une' }

function isComparison(op: TypedBinaryOp): op is Comparison {
	return op === 'eq' || op === 'ne' || op === 'lt' || op === 'le' || op === 'gt' || op === 'ge'
}

const DIVISION_BY_ZERO = 'DivisionByZeroError'

function lookup(table: Partial<Record<string, string>>, key: string, what: string): string {
	const found = table[key]
	if (found === undefined) throw new InternalCompilerError('lower', `no ${what} for ${key}`)
	return found
}

// ============================================================================
// Function Lowering
// ============================================================================

class FunctionLowering {
	private readonly blocks = new Map<number, MutableBlock>()
	/** IR blocks of each SSA block, primary block first */
	private readonly segments = new Map<BlockId, MutableBlock[]>()
	/** Block holding the terminator of each SSA block */
	private readonly exits = new Map<BlockId, MutableBlock>()
	private readonly types = new Map<number, IrType>()
	private readonly values = new Map<ValueId, number>()
	private readonly phis: PendingPhi[] = []
	private current: MutableBlock
	private owner: BlockId
	/** Unwind target while lowering the operation of an SSA invoke */
	private unwind: number | null = null
	private nextValue = 0
	private nextBlock: number

	constructor(
		private readonly fn: SsaFunction,
		private readonly symbols: SymbolTable,
		private readonly externs: ReadonlySet<string>
	) {
		this.nextBlock = fn.blocks.length
		for (const block of fn.blocks) {
			const primary: MutableBlock = { id: block.id, insts: [], terminator: null }
			this.blocks.set(block.id, primary)
			this.segments.set(block.id, [primary])
		}
		const entry = fn.blocks[0]
		if (entry === undefined) throw new InternalCompilerError('lower', `${fn.name} has no blocks`)
		this.owner = entry.id
		this.current = this.primary(entry.id)
	}

	run(): IrFunction {
		const params = this.fn.params.map((param) => {
			const type = irTypeOf(param.type)
			const id = this.fresh(type)
			this.values.set(param.value, id)
			return { id, name: param.name, type }
		})
		// Phi results first, so uses in any block can refer to them
		for (const block of this.fn.blocks) {
			for (const phi of block.phis) {
				const result = this.fresh(irTypeOf(phi.type))
				this.values.set(phi.dest, result)
				this.phis.push({ block: block.id, incoming: phi.incoming, result, type: phi.type })
			}
		}
		const byId = new Map(this.fn.blocks.map((block) => [block.id, block]))
		for (const id of reversePostorder(this.fn.blocks, cfgSuccessors(this.fn.blocks))) {
			const block = byId.get(id)
			if (block !== undefined) this.lowerBlock(block)
		}
		this.fillPhis()
		return this.finish(params)
	}

	// ==========================================================================
	// Blocks and Values
	// ==========================================================================

	private primary(id: BlockId): MutableBlock {
		const block = this.blocks.get(id)
		if (block === undefined) throw new InternalCompilerError('lower', `missing block bb${id}`)
		return block
	}

	private split(): MutableBlock {
		const block: MutableBlock = { id: this.nextBlock++, insts: [], terminator: null }
		this.blocks.set(block.id, block)
		this.segments.get(this.owner)?.push(block)
		return block
	}

	private fresh(type: IrType): number {
		const id = this.nextValue++
		this.types.set(id, type)
		return id
	}

	private typeOf(value: number): IrType {
		const type = this.types.get(value)
		if (type === undefined) throw new InternalCompilerError('lower', `value %${value} has no type`)
		return type
	}

	private emit(inst: IrInst): void {
		this.current.insts.push(inst)
	}

	private terminate(terminator: IrTerminator): void {
		invariant(this.current.terminator === null, 'lower', `block bb${this.current.id} terminated twice`)
		this.current.terminator = terminator
	}

	private operand(operand: SsaOperand): number {
		if (operand.kind === 'const') return this.constant(operand.value, operand.type)
		const value = this.values.get(operand.id)
		if (value === undefined) throw new InternalCompilerError('lower', `SSA value %${operand.id} used before lowering`)
		return value
	}

	private operands(list: readonly SsaOperand[]): number[] {
		return list.map((operand) => this.operand(operand))
	}

	private define(dest: ValueId | null, value: number | null): void {
		if (dest === null) return
		if (value === null) throw new InternalCompilerError('lower', `SSA value %${dest} has no lowered value`)
		this.values.set(dest, value)
	}

	// ==========================================================================
	// Constants and Conversions
	// ==========================================================================

	private constant(value: ConstValue, type: PhpType): number {
		const native = this.nativeConstant(value)
		return this.convert(native, constType(value), type, 'implicit')
	}

	private nativeConstant(value: ConstValue): number {
		const make = (type: IrType, v: bigint | number | boolean | string | null) => {
			const result = this.fresh(type)
			this.emit({ op: 'const', result, type, value: v })
			return result
		}
		switch (value.kind) {
			case 'int':
				return make('i64', value.value)
			case 'float':
				return make('f64', value.value)
			case 'bool':
				return make('i1', value.value)
			case 'string':
				return make('str', value.value)
			case 'null':
				return make('box', null)
			case 'array': {
				let array = this.runtime('rt_array_new', [])
				for (const entry of value.entries) {
					const key = this.constant(entry.key, MIXED)
					const element = this.constant(entry.value, MIXED)
					array = this.runtime('rt_array_set', [array, key, element])
				}
				return array
			}
		}
	}

	private box(value: number): number {
		const type = this.typeOf(value)
		if (type === 'box') return value
		return this.runtime(lookup(BOX, type, 'boxing'), [value])
	}

	private convert(value: number, from: PhpType, to: PhpType, mode: 'implicit' | 'cast'): number {
		const source = this.typeOf(value)
		const target = irTypeOf(to)
		if (source === target) return value
		if (target === 'box') return this.box(value)
		if (source === 'box') {
			if (target === 'obj') {
				if (to.kind !== 'object') throw new InternalCompilerError('lower', 'object conversion without a class')
				return this.runtime('rt_unbox_obj', [value, this.constant(stringConst(to.className), STRING)])
			}
			return this.runtime(lookup(mode === 'cast' ? CAST : UNBOX, target, `conversion from ${from.kind}`), [value])
		}
		switch (`${source}>${target}`) {
			case 'i64>f64':
				return this.cast('sitofp', value, 'f64')
			case 'i1>i64':
				return this.cast('zext', value, 'i64')
			case 'i1>f64':
				return this.cast('sitofp', this.cast('zext', value, 'i64'), 'f64')
			case 'i64>i1':
				return this.icmp('ne', value, this.constant({ kind: 'int', value: 0n }, INT))
			case 'f64>i1':
				return this.fcmp('une', value, this.constant({ kind: 'float', value: 0 }, FLOAT))
			case 'f64>i64':
				return this.runtime('rt_float_to_int', [value])
			case 'arr>i1':
				return this.runtime('rt_to_bool', [this.box(value)])
		}
		if (target === 'str') return this.runtime(lookup(SCALAR_TO_STRING, source, 'string conversion'), [value])
		if (source === 'str') return this.runtime(lookup(STRING_TO_SCALAR, target, 'string conversion'), [value])
		throw new InternalCompilerError('lower', `cannot convert ${source} to ${target}`)
	}

	private cast(kind: 'sitofp' | 'zext', operand: number, type: IrType): number {
		const result = this.fresh(type)
		this.emit({ kind, op: 'cast', operand, result, type })
		return result
	}

	private icmp(predicate: IcmpPredicate, left: number, right: number): number {
		const result = this.fresh('i1')
		this.emit({ left, op: 'icmp', predicate, result, right, type: 'i1' })
		return result
	}

	private fcmp(predicate: FcmpPredicate, left: number, right: number): number {
		const result = this.fresh('i1')
		this.emit({ left, op: 'fcmp', predicate, result, right, type: 'i1' })
		return result
	}

	private arith(kind: ArithOp, left: number, right: number): number {
		const type = this.typeOf(left)
		const result = this.fresh(type)
		this.emit({ kind, left, op: 'arith', result, right, type })
		return result
	}

	private not(operand: number): number {
		const result = this.fresh('i1')
		this.emit({ kind: 'not', op: 'unop', operand, result, type: 'i1' })
		return result
	}

	// ==========================================================================
	// Calls
	// ==========================================================================

	/**
	 * Emit a call. A call that may throw while an unwind target is set
	 * ends the block with an invoke and continues in a fresh block.
	 */
	private call(callee: Callee, args: readonly number[], type: IrType, effect: Effect, mayThrow: boolean): number | null {
		const result = type === 'void' ? null : this.fresh(type)
		const call: CallInst = { args, callee, cleanup: [], effect, op: 'call', result, type }
		if (mayThrow && this.unwind !== null) {
			const normal = this.split()
			this.terminate({ call, normal: normal.id, op: 'invoke', unwind: this.unwind })
			this.current = normal
		} else {
			this.emit(call)
		}
		return result
	}

	/** Call a runtime entry that returns a value */
	private runtime(name: string, args: readonly number[]): number {
		const result = this.runtimeCall(name, args)
		if (result === null) throw new InternalCompilerError('lower', `${name} returns nothing`)
		return result
	}

	private runtimeCall(name: string, args: readonly number[]): number | null {
		const entry = runtimeFunction(name)
		if (args.length < entry.params.length || (entry.variadic === null && args.length > entry.params.length)) {
			throw new InternalCompilerError('lower', `${name} takes ${entry.params.length} argument(s), got ${args.length}`)
		}
		const adjusted = args.map((arg, i) => {
			const expected = entry.params[i] ?? entry.variadic
			const actual = this.typeOf(arg)
			if (expected === actual) return arg
			if (expected === 'box') return this.box(arg)
			throw new InternalCompilerError('lower', `${name} argument ${i} is ${actual}, expected ${expected}`)
		})
		return this.call({ kind: 'direct', name }, adjusted, entry.returns, entry.effect, entry.mayThrow)
	}

	private userCall(name: string, args: readonly number[], type: PhpType): number | null {
		const foreign = this.externs.has(name)
		return this.call({ kind: 'direct', name }, args, irTypeOf(type), 'write', !foreign)
	}

	private newObject(className: string): number {
		const symbol = this.symbols.lookupClass(className)
		if (symbol === undefined) throw new InternalCompilerError('lower', `unknown class ${className}`)
		const object = this.fresh('obj')
		this.emit({ className: symbol.name, op: 'object_new', result: object, type: 'obj' })
		for (const slot of symbol.layout.slots) {
			if (slot.default === null) continue
			const value = this.constant(slot.default, slot.type)
			this.emit({ className: symbol.name, object, op: 'field_store', slot: slot.slot, value })
		}
		return object
	}

	/** Construct `className` with `message` and raise it */
	private raiseNew(className: string, message: string): void {
		const object = this.newObject(className)
		const constructor = this.symbols.findMethod(className, CONSTRUCTOR)
		if (constructor !== undefined) {
			const text = this.constant(stringConst(message), STRING)
			this.call({ kind: 'direct', name: constructor.mangled }, [object, text], 'void', 'write', true)
		}
		this.terminate({ op: 'raise', unwind: this.unwind, value: object })
	}

	/** Branch to a raise of DivisionByZeroError when `test` holds */
	private guard(test: number, message: string): void {
		const fail = this.split()
		const ok = this.split()
		this.terminate({ cond: test, else: ok.id, op: 'condbr', then: fail.id })
		this.current = fail
		this.raiseNew(DIVISION_BY_ZERO, message)
		this.current = ok
	}

	// ==========================================================================
	// Operators
	// ==========================================================================

	private binary(op: TypedBinaryOp, operandType: PhpType, left: number, right: number): number {
		const type = irTypeOf(operandType)
		if (isComparison(op)) return this.compare(op, type, left, right)
		switch (op) {
			case 'div':
			case 'mod': {
				const message = op === 'div' ? 'Division by zero' : 'Modulo by zero'
				if (type === 'i64') {
					this.guard(this.icmp('eq', right, this.constant({ kind: 'int', value: 0n }, INT)), message)
					return this.arith(op === 'div' ? 'sdiv' : 'srem', left, right)
				}
				if (type === 'f64' && op === 'div') {
					this.guard(this.fcmp('oeq', right, this.constant({ kind: 'float', value: 0 }, FLOAT)), message)
					return this.arith('fdiv', left, right)
				}
				break
			}
			case 'pow':
				if (type === 'i64') return this.runtime('rt_ipow', [left, right])
				if (type === 'f64') return this.runtime('rt_fpow', [left, right])
				break
			case 'concat':
				return this.runtime('rt_concat', [left, right])
			case 'shl':
				return this.runtime('rt_shl', [left, right])
			case 'shr':
				return this.runtime('rt_shr', [left, right])
			case 'cmp':
				return this.runtime(this.orderingRuntime(type), [left, right])
			case 'identical':
			case 'notIdentical': {
				const same = this.identical(type, left, right)
				return op === 'identical' ? same : this.not(same)
			}
			default: {
				const machine = type === 'i64' ? INT_ARITH[op] : type === 'f64' ? FLOAT_ARITH[op] : undefined
				if (machine !== undefined) return this.arith(machine, left, right)
			}
		}
		if (type === 'box') return this.runtime(lookup(MIXED_ARITH, op, 'mixed operator'), [left, right])
		throw new InternalCompilerError('lower', `no lowering for ${op} on ${type}`)
	}

	private orderingRuntime(type: IrType): string {
		switch (type) {
			case 'i64':
				return 'rt_int_cmp'
			case 'f64':
				return 'rt_float_cmp'
			case 'str':
				return 'rt_str_cmp'
			default:
				return 'rt_mixed_cmp'
		}
	}

	private compare(op: Comparison, type: IrType, left: number, right: number): number {
		switch (type) {
			case 'i64':
			case 'i1':
				return this.icmp(ICMP[op], left, right)
			case 'f64':
				return this.fcmp(FCMP[op], left, right)
		}
		if (op === 'eq' || op === 'ne') {
			const equal =
				type === 'str'
					? this.runtime('rt_str_eq', [left, right])
					: this.runtime('rt_loose_eq', [this.box(left), this.box(right)])
			return op === 'eq' ? equal : this.not(equal)
		}
		const order =
			type === 'str'
				? this.runtime('rt_str_cmp', [left, right])
				: this.runtime('rt_mixed_cmp', [this.box(left), this.box(right)])
		return this.icmp(ICMP[op], order, this.constant({ kind: 'int', value: 0n }, INT))
	}

	private identical(type: IrType, left: number, right: number): number {
		switch (type) {
			case 'i64':
			case 'i1':
				return this.icmp('eq', left, right)
			case 'f64':
				return this.fcmp('oeq', left, right)
			case 'str':
				return this.runtime('rt_str_eq', [left, right])
			case 'obj':
				return this.runtime('rt_obj_identical', [left, right])
			default:
				return this.runtime('rt_identical', [this.box(left), this.box(right)])
		}
	}

	private unary(op: 'not' | 'neg' | 'bitNot', operand: number): number {
		const type = this.typeOf(operand)
		const kind = op === 'not' ? 'not' : op === 'bitNot' ? 'bitnot' : type === 'f64' ? 'fneg' : 'neg'
		const result = this.fresh(type)
		this.emit({ kind, op: 'unop', operand, result, type })
		return result
	}

	// ==========================================================================
	// Operations
	// ==========================================================================

	private rvalue(value: Rvalue<SsaOperand>, type: PhpType): number | null {
		switch (value.kind) {
			case 'use':
				return this.convert(this.operand(value.value), value.value.type, type, 'implicit')
			case 'binary': {
				const left = this.operand(value.left)
				const right = this.operand(value.right)
				return this.binary(value.op, value.operandType, left, right)
			}
			case 'unary':
				return this.unary(value.op, this.operand(value.operand))
			case 'convert':
				return this.convert(this.operand(value.value), value.from, value.to, value.mode)
			case 'call':
				return this.userCall(value.callee, this.operands(value.args), type)
			case 'builtin':
				return this.runtimeCall(value.runtime, this.operands(value.args))
			case 'new':
				return this.newObject(value.className)
			case 'methodCall': {
				const object = this.operand(value.object)
				const args = [object, ...this.operands(value.args)]
				if (value.dispatch === 'static') return this.userCall(value.target, args, type)
				const target = this.fresh('fn')
				if (value.dispatch === 'virtual') {
					const slot = this.symbols.vtableSlot(value.className, value.target)
					if (slot < 0) throw new InternalCompilerError('lower', `${value.className}::${value.target} has no vtable slot`)
					this.emit({ object, op: 'vtable_load', result: target, slot, type: 'fn' })
				} else {
					this.emit({ method: value.target, object, op: 'method_lookup', result: target, type: 'fn' })
				}
				return this.call({ kind: 'indirect', value: target }, args, irTypeOf(type), 'write', true)
			}
			case 'dynMethodCall': {
				const object = this.box(this.operand(value.object))
				const method = this.constant(stringConst(value.method), STRING)
				const args = this.operands(value.args).map((arg) => this.box(arg))
				return this.runtime('rt_dyn_call', [object, method, ...args])
			}
			case 'propGet': {
				const result = this.fresh(irTypeOf(type))
				const object = this.operand(value.object)
				this.emit({ className: value.className, object, op: 'field_load', result, slot: value.slot, type: irTypeOf(type) })
				return result
			}
			case 'dynPropGet': {
				const object = this.box(this.operand(value.object))
				return this.runtime('rt_dyn_prop_get', [object, this.constant(stringConst(value.name), STRING)])
			}
			case 'arrayNew':
				return this.runtime('rt_array_new', [])
			case 'arraySet': {
				const array = this.operand(value.array)
				const key = this.box(this.operand(value.key))
				const element = this.box(this.operand(value.value))
				return this.runtime('rt_array_set', [array, key, element])
			}
			case 'arrayPush': {
				const array = this.operand(value.array)
				return this.runtime('rt_array_push', [array, this.box(this.operand(value.value))])
			}
			case 'arrayUnset': {
				const array = this.operand(value.array)
				return this.runtime('rt_array_unset', [array, this.box(this.operand(value.key))])
			}
			case 'arrayGet': {
				const array = this.operand(value.array)
				const key = this.box(this.operand(value.key))
				return this.runtime(`rt_array_get_${irTypeOf(type)}`, [array, key])
			}
			case 'arrayHas': {
				const array = this.operand(value.array)
				return this.runtime('rt_array_has', [array, this.box(this.operand(value.key))])
			}
			case 'arrayCount':
				return this.runtime('rt_array_count', [this.operand(value.array)])
			case 'arrayKeyAt':
				return this.runtime(`rt_array_key_at_${irTypeOf(type)}`, this.operands([value.array, value.index]))
			case 'arrayValueAt':
				return this.runtime(`rt_array_value_at_${irTypeOf(type)}`, this.operands([value.array, value.index]))
			case 'isNull': {
				const operand = this.operand(value.value)
				if (this.typeOf(operand) === 'box') return this.runtime('rt_is_null', [operand])
				return this.constant({ kind: 'bool', value: false }, { kind: 'bool' })
			}
			case 'instanceOf': {
				const operand = this.operand(value.value)
				const operandType = this.typeOf(operand)
				if (operandType === 'obj') {
					const result = this.fresh('i1')
					this.emit({ className: value.className, op: 'instance_of', result, type: 'i1', value: operand })
					return result
				}
				if (operandType === 'box') {
					return this.runtime('rt_box_instance_of', [operand, this.constant(stringConst(value.className), STRING)])
				}
				return this.constant({ kind: 'bool', value: false }, { kind: 'bool' })
			}
			case 'caught': {
				const result = this.fresh('obj')
				this.emit({ op: 'landingpad', result, type: 'obj' })
				return result
			}
		}
	}

	// ==========================================================================
	// Blocks
	// ==========================================================================

	private lowerBlock(block: SsaBlock): void {
		this.owner = block.id
		this.current = this.primary(block.id)
		for (const inst of block.insts) {
			switch (inst.kind) {
				case 'assign':
					this.define(inst.dest, this.rvalue(inst.value, inst.type))
					break
				case 'propSet': {
					const object = this.operand(inst.object)
					const value = this.operand(inst.value)
					this.emit({ className: inst.className, object, op: 'field_store', slot: inst.slot, value })
					break
				}
				case 'echo': {
					const value = this.operand(inst.value)
					this.runtimeCall('rt_echo', [this.convert(value, inst.value.type, STRING, 'cast')])
					break
				}
			}
		}
		const terminator = block.terminator
		switch (terminator.kind) {
			case 'jump':
				this.terminate({ op: 'br', target: terminator.target })
				break
			case 'branch':
				this.terminate({ cond: this.operand(terminator.cond), else: terminator.else, op: 'condbr', then: terminator.then })
				break
			case 'return': {
				const value =
					terminator.value === null || this.fn.returnType.kind === 'void'
						? null
						: this.convert(this.operand(terminator.value), terminator.value.type, this.fn.returnType, 'implicit')
				this.terminate({ op: 'ret', value })
				break
			}
			case 'throw':
				this.terminate({ op: 'raise', unwind: terminator.unwind, value: this.operand(terminator.value) })
				break
			case 'invoke':
				this.unwind = terminator.unwind
				try {
					this.define(terminator.dest, this.rvalue(terminator.value, terminator.type))
				} finally {
					this.unwind = null
				}
				this.terminate({ op: 'br', target: terminator.normal })
				break
			case 'unreachable':
				this.terminate({ op: 'unreachable' })
				break
		}
		this.exits.set(block.id, this.current)
	}

	/** Incoming values of phis come from the block ending each predecessor */
	private fillPhis(): void {
		const byBlock = new Map<BlockId, IrInst[]>()
		for (const phi of this.phis) {
			const incoming: PhiIncoming[] = phi.incoming.map((edge) => {
				const exit = this.exits.get(edge.block)
				if (exit === undefined) throw new InternalCompilerError('lower', `predecessor bb${edge.block} was not lowered`)
				this.current = exit
				const value = this.convert(this.operand(edge.value), edge.value.type, phi.type, 'implicit')
				return { block: exit.id, value }
			})
			const list = byBlock.get(phi.block) ?? []
			list.push({ incoming, op: 'phi', result: phi.result, type: irTypeOf(phi.type) })
			byBlock.set(phi.block, list)
		}
		for (const [blockId, insts] of byBlock) this.primary(blockId).insts.unshift(...insts)
	}

	/**
	 * Drop blocks no path reaches (landing blocks whose operation lowered
	 * to nothing that throws) and number the rest densely in layout order.
	 */
	private finish(params: IrFunction['params']): IrFunction {
		const layout: MutableBlock[] = []
		for (const block of this.fn.blocks) layout.push(...(this.segments.get(block.id) ?? []))
		const reached = new Set<number>()
		const entry = layout[0]
		const work = entry === undefined ? [] : [entry.id]
		while (work.length > 0) {
			const id = work.pop()
			if (id === undefined || reached.has(id)) continue
			reached.add(id)
			const terminator = this.blocks.get(id)?.terminator
			if (terminator === null || terminator === undefined) {
				throw new InternalCompilerError('lower', `block bb${id} is not terminated`)
			}
			work.push(...terminatorSuccessors(terminator))
		}
		const kept = layout.filter((block) => reached.has(block.id))
		const number = new Map(kept.map((block, i) => [block.id, i]))
		const renumber = (id: number): number => {
			const found = number.get(id)
			if (found === undefined) throw new InternalCompilerError('lower', `edge to pruned block bb${id}`)
			return found
		}
		const blocks: IrBlock[] = kept.map((block) => ({
			id: renumber(block.id),
			insts: block.insts.map((inst) =>
				inst.op === 'phi'
					? {
							...inst,
							incoming: inst.incoming
								.filter((edge) => reached.has(edge.block))
								.map((edge) => ({ block: renumber(edge.block), value: edge.value })),
						}
					: inst
			),
			terminator: retarget(block.terminator, renumber),
		}))
		return {
			blocks,
			name: this.fn.name,
			params,
			returnType: irTypeOf(this.fn.returnType),
			values: this.types,
		}
	}
}

function retarget(terminator: IrTerminator | null, map: (id: number) => number): IrTerminator {
	if (terminator === null) throw new InternalCompilerError('lower', 'unterminated block')
	switch (terminator.op) {
		case 'br':
			return { op: 'br', target: map(terminator.target) }
		case 'condbr':
			return { ...terminator, else: map(terminator.else), then: map(terminator.then) }
		case 'invoke':
			return { ...terminator, normal: map(terminator.normal), unwind: map(terminator.unwind) }
		case 'raise':
			return { ...terminator, unwind: terminator.unwind === null ? null : map(terminator.unwind) }
		case 'ret':
		case 'unreachable':
			return terminator
	}
}

// ============================================================================
// Module
// ============================================================================

function lowerClass(symbol: ClassSymbol, symbols: SymbolTable): IrClass {
	const methods = new Map<string, string>()
	for (const name of symbols.ancestry(symbol.name).reverse()) {
		for (const [key, method] of symbols.lookupClass(name)?.methods ?? []) {
			if (!method.isAbstract) methods.set(key, method.mangled)
		}
	}
	return {
		interfaces: symbols.allInterfaces(symbol.name),
		isInterface: symbol.isInterface,
		methods,
		name: symbol.name,
		parent: symbol.parent,
		slots: symbol.layout.slots.map((slot) => ({ name: slot.name, type: irTypeOf(slot.type) })),
		vtable: symbol.layout.vtable.map((entry) => entry.implementation),
	}
}

function lowerExtern(symbol: FunctionSymbol): IrExtern | null {
	if (symbol.foreign === null) return null
	return {
		library: symbol.foreign.library,
		name: symbol.mangled,
		params: symbol.params.map((param) => irTypeOf(param.type)),
		returnType: irTypeOf(symbol.returnType),
		symbol: symbol.foreign.symbol,
	}
}

export function lowerFunction(fn: SsaFunction, symbols: SymbolTable, externs: ReadonlySet<string> = new Set()): IrFunction {
	return new FunctionLowering(fn, symbols, externs).run()
}

/**
 * Lower every function of a unit into one module. Reference counts are
 * not inserted yet.
 */
export function lowerUnit(
	functions: readonly SsaFunction[],
	resolved: ResolvedUnit,
	options: Pick<ResolvedOptions, 'runtime' | 'target'>
): IrModule {
	const externs = resolved.externs.map(lowerExtern).filter((e): e is IrExtern => e !== null)
	const foreign = new Set(externs.map((e) => e.name))
	const { symbols } = resolved
	return {
		classes: resolved.classes.map((symbol) => lowerClass(symbol, symbols)),
		entry: unitMainName(symbols.unit),
		externs,
		functions: functions.map((fn) => lowerFunction(fn, symbols, foreign)),
		name: symbols.unit,
		requires: resolved.requires,
		runtime: options.runtime,
		target: options.target,
	}
}
