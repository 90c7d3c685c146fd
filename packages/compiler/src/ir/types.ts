/**
 * Lowered IR.
 *
 * Functions over basic blocks of typed instructions in SSA form. Values
 * are numbered per function; every instruction defines at most one.
 * Handles (`str`, `arr`, `obj`, `box`) are reference counted: each
 * defining instruction yields an owned reference, `rc_inc`/`rc_dec`
 * adjust the count explicitly.
 */

import type { PhpType } from '../check/types.ts'
import type { RuntimeConfig } from '../pipeline/options.ts'

export const IrType = {
	Array: 'arr',
	Bool: 'i1',
	Box: 'box',
	Float: 'f64',
	Function: 'fn',
	Int: 'i64',
	Object: 'obj',
	String: 'str',
	Void: 'void',
} as const

export type IrType = (typeof IrType)[keyof typeof IrType]

export function isHandle(type: IrType): boolean {
	return type === 'str' || type === 'arr' || type === 'obj' || type === 'box'
}

/**
 * Machine representation of a static type. Values that may be null or of
 * unknown type are boxed.
 */
export function irTypeOf(type: PhpType): IrType {
	switch (type.kind) {
		case 'int':
			return 'i64'
		case 'float':
			return 'f64'
		case 'bool':
			return 'i1'
		case 'string':
			return 'str'
		case 'array':
			return 'arr'
		case 'object':
			return 'obj'
		case 'void':
			return 'void'
		case 'null':
		case 'mixed':
		case 'never':
			return 'box'
	}
}

/** Side effects of a call, for the optimizer */
export type Effect = 'none' | 'read' | 'write'

export type ArithOp = 'add' | 'sub' | 'mul' | 'sdiv' | 'srem' | 'and' | 'or' | 'xor' | 'fadd' | 'fsub' | 'fmul' | 'fdiv'

export type IcmpPredicate = 'eq' | 'ne' | 'slt' | 'sle' | 'sgt' | 'sge'

export type FcmpPredicate = 'oeq' | 'une' | 'olt' | 'ole' | 'ogt' | 'oge'

export type UnaryOp = 'not' | 'neg' | 'fneg' | 'bitnot'

export type CastOp = 'sitofp' | 'zext'

export type Callee = { readonly kind: 'direct'; readonly name: string } | { readonly kind: 'indirect'; readonly value: number }

export interface CallInst {
	readonly op: 'call'
	readonly result: number | null
	readonly type: IrType
	readonly callee: Callee
	readonly args: readonly number[]
	readonly effect: Effect
	/**
	 * Handles owned by the caller when the call unwinds out of the
	 * function; released before the exception propagates
	 */
	readonly cleanup: readonly number[]
}

export interface PhiIncoming {
	readonly block: number
	readonly value: number
}

export type IrInst =
	| {
			readonly op: 'const'
			readonly result: number
			readonly type: IrType
			/** `null` only for `box`, the boxed null */
			readonly value: bigint | number | boolean | string | null
	  }
	| {
			readonly op: 'arith'
			readonly result: number
			readonly type: IrType
			readonly kind: ArithOp
			readonly left: number
			readonly right: number
	  }
	| {
			readonly op: 'icmp'
			readonly result: number
			readonly type: 'i1'
			readonly predicate: IcmpPredicate
			readonly left: number
			readonly right: number
	  }
	| {
			readonly op: 'fcmp'
			readonly result: number
			readonly type: 'i1'
			readonly predicate: FcmpPredicate
			readonly left: number
			readonly right: number
	  }
	| { readonly op: 'unop'; readonly result: number; readonly type: IrType; readonly kind: UnaryOp; readonly operand: number }
	| { readonly op: 'cast'; readonly result: number; readonly type: IrType; readonly kind: CastOp; readonly operand: number }
	| CallInst
	/** Implementation in vtable slot `slot` of the receiver's class */
	| {
			readonly op: 'vtable_load'
			readonly result: number
			readonly type: 'fn'
			readonly object: number
			readonly slot: number
	  }
	/** Implementation of `method` on the receiver's class, for interface calls */
	| {
			readonly op: 'method_lookup'
			readonly result: number
			readonly type: 'fn'
			readonly object: number
			readonly method: string
	  }
	| {
			readonly op: 'field_load'
			readonly result: number
			readonly type: IrType
			readonly object: number
			readonly className: string
			readonly slot: number
	  }
	/** Moves `value` into the slot and releases the previous occupant */
	| {
			readonly op: 'field_store'
			readonly object: number
			readonly className: string
			readonly slot: number
			readonly value: number
	  }
	| { readonly op: 'object_new'; readonly result: number; readonly type: 'obj'; readonly className: string }
	| {
			readonly op: 'instance_of'
			readonly result: number
			readonly type: 'i1'
			readonly value: number
			readonly className: string
	  }
	| { readonly op: 'rc_inc'; readonly value: number }
	| { readonly op: 'rc_dec'; readonly value: number }
	/** The in-flight exception; first instruction of an unwind target */
	| { readonly op: 'landingpad'; readonly result: number; readonly type: 'obj' }
	| { readonly op: 'phi'; readonly result: number; readonly type: IrType; readonly incoming: readonly PhiIncoming[] }

export type IrTerminator =
	| { readonly op: 'ret'; readonly value: number | null }
	| { readonly op: 'br'; readonly target: number }
	| { readonly op: 'condbr'; readonly cond: number; readonly then: number; readonly else: number }
	| { readonly op: 'invoke'; readonly call: CallInst; readonly normal: number; readonly unwind: number }
	/** Throws `value`, moving it to the unwinder */
	| { readonly op: 'raise'; readonly value: number; readonly unwind: number | null }
	| { readonly op: 'unreachable' }

export interface IrBlock {
	readonly id: number
	readonly insts: readonly IrInst[]
	readonly terminator: IrTerminator
}

export interface IrParam {
	readonly id: number
	readonly type: IrType
	readonly name: string
}

export interface IrFunction {
	readonly name: string
	readonly params: readonly IrParam[]
	readonly returnType: IrType
	/** Entry block first */
	readonly blocks: readonly IrBlock[]
	/** Type of every value, parameters included */
	readonly values: ReadonlyMap<number, IrType>
}

export interface IrExtern {
	readonly name: string
	readonly library: string
	readonly symbol: string
	readonly params: readonly IrType[]
	readonly returnType: IrType
}

export interface IrSlot {
	readonly name: string
	readonly type: IrType
}

export interface IrClass {
	readonly name: string
	readonly parent: string | null
	readonly interfaces: readonly string[]
	readonly isInterface: boolean
	/** Inherited slots first */
	readonly slots: readonly IrSlot[]
	/** Implementation per vtable slot */
	readonly vtable: readonly string[]
	/** Lower-case method name to implementation, for interface dispatch */
	readonly methods: ReadonlyMap<string, string>
}

export interface IrModule {
	readonly name: string
	readonly target: string
	readonly runtime: RuntimeConfig
	/** Units whose modules must be loaded first */
	readonly requires: readonly string[]
	/** Function holding the unit's top-level code */
	readonly entry: string
	readonly classes: readonly IrClass[]
	readonly externs: readonly IrExtern[]
	readonly functions: readonly IrFunction[]
}

// ============================================================================
// Traversal
// ============================================================================

export function instResult(inst: IrInst): number | null {
	switch (inst.op) {
		case 'field_store':
		case 'rc_inc':
		case 'rc_dec':
			return null
		default:
			return inst.result
	}
}

function calleeOperands(callee: Callee): number[] {
	return callee.kind === 'indirect' ? [callee.value] : []
}

/** Values an instruction reads, phi operands excluded */
export function instOperands(inst: IrInst): number[] {
	switch (inst.op) {
		case 'const':
		case 'object_new':
		case 'landingpad':
		case 'phi':
			return []
		case 'arith':
		case 'icmp':
		case 'fcmp':
			return [inst.left, inst.right]
		case 'unop':
		case 'cast':
			return [inst.operand]
		case 'call':
			return [...calleeOperands(inst.callee), ...inst.args]
		case 'vtable_load':
		case 'method_lookup':
		case 'field_load':
			return [inst.object]
		case 'field_store':
			return [inst.object, inst.value]
		case 'instance_of':
		case 'rc_inc':
		case 'rc_dec':
			return [inst.value]
	}
}

export function terminatorOperands(terminator: IrTerminator): number[] {
	switch (terminator.op) {
		case 'ret':
			return terminator.value === null ? [] : [terminator.value]
		case 'condbr':
			return [terminator.cond]
		case 'invoke':
			return instOperands(terminator.call)
		case 'raise':
			return [terminator.value]
		case 'br':
		case 'unreachable':
			return []
	}
}

export function terminatorSuccessors(terminator: IrTerminator): number[] {
	switch (terminator.op) {
		case 'br':
			return [terminator.target]
		case 'condbr':
			return [terminator.then, terminator.else]
		case 'invoke':
			return [terminator.normal, terminator.unwind]
		case 'raise':
			return terminator.unwind === null ? [] : [terminator.unwind]
		case 'ret':
		case 'unreachable':
			return []
	}
}

/** Stable predecessor lists: block order, then successor order */
export function irPredecessors(fn: IrFunction): Map<number, number[]> {
	const preds = new Map<number, number[]>()
	for (const block of fn.blocks) preds.set(block.id, [])
	for (const block of fn.blocks) {
		for (const target of terminatorSuccessors(block.terminator)) {
			const list = preds.get(target)
			if (list !== undefined && !list.includes(block.id)) list.push(block.id)
		}
	}
	return preds
}

export interface IrGraph {
	readonly blocks: readonly { readonly id: number; readonly preds: readonly number[] }[]
	next(block: number): readonly number[]
}

/** Blocks with predecessor lists and a successor function, for dominance */
export function irGraph(fn: IrFunction): IrGraph {
	const preds = irPredecessors(fn)
	const succs = new Map(fn.blocks.map((block) => [block.id, terminatorSuccessors(block.terminator)]))
	return {
		blocks: fn.blocks.map((block) => ({ id: block.id, preds: preds.get(block.id) ?? [] })),
		next: (block) => succs.get(block) ?? [],
	}
}
