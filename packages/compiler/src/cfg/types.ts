/**
 * Control-flow graph of one function.
 *
 * Instructions are three-address operations over operands. The same
 * instruction shapes serve the normalized CFG, where operands name
 * variables, and its SSA form, where they name values: both are
 * instances of the generic types below.
 */

import type { TypedBinaryOp, TypedUnaryOp } from '../check/typed.ts'
import type { PhpType } from '../check/types.ts'
import type { ConstValue } from '../check/values.ts'
import type { SourceLocation } from '../core/location.ts'

export type BlockId = number & { readonly __brand: 'BlockId' }

export function blockId(n: number): BlockId {
	return n as BlockId
}

// ============================================================================
// Operands
// ============================================================================

export interface ConstOperand {
	readonly kind: 'const'
	readonly value: ConstValue
	readonly type: PhpType
}

export interface VarOperand {
	readonly kind: 'var'
	readonly name: string
	readonly type: PhpType
}

/** Operand of the normalized CFG */
export type Operand = VarOperand | ConstOperand

// ============================================================================
// Rvalues
// ============================================================================

/**
 * Dispatch of a method call: `static` calls `target` directly, `virtual`
 * loads the vtable slot of method `target` of `className`, `interface`
 * looks method `target` up on the receiver's runtime class.
 */
export type Dispatch = 'static' | 'virtual' | 'interface'

export type Rvalue<O> =
	| { readonly kind: 'use'; readonly value: O }
	| {
			readonly kind: 'binary'
			readonly op: TypedBinaryOp
			/** Type both operands have been converted to */
			readonly operandType: PhpType
			readonly left: O
			readonly right: O
	  }
	| { readonly kind: 'unary'; readonly op: TypedUnaryOp; readonly operand: O }
	| {
			readonly kind: 'convert'
			readonly from: PhpType
			readonly to: PhpType
			readonly mode: 'implicit' | 'cast'
			readonly value: O
	  }
	| { readonly kind: 'call'; readonly callee: string; readonly args: readonly O[] }
	| { readonly kind: 'builtin'; readonly runtime: string; readonly args: readonly O[] }
	| { readonly kind: 'new'; readonly className: string }
	| {
			readonly kind: 'methodCall'
			readonly dispatch: Dispatch
			readonly className: string
			readonly target: string
			readonly object: O
			readonly args: readonly O[]
	  }
	| { readonly kind: 'dynMethodCall'; readonly object: O; readonly method: string; readonly args: readonly O[] }
	| {
			readonly kind: 'propGet'
			readonly object: O
			readonly className: string
			readonly name: string
			readonly slot: number
	  }
	| { readonly kind: 'dynPropGet'; readonly object: O; readonly name: string }
	| { readonly kind: 'arrayNew' }
	/** Copy-on-write update; yields the updated array */
	| { readonly kind: 'arraySet'; readonly array: O; readonly key: O; readonly value: O }
	| { readonly kind: 'arrayPush'; readonly array: O; readonly value: O }
	| { readonly kind: 'arrayUnset'; readonly array: O; readonly key: O }
	/** Element or the element type's zero value when the key is absent */
	| { readonly kind: 'arrayGet'; readonly array: O; readonly key: O }
	/** Key present with a non-null value */
	| { readonly kind: 'arrayHas'; readonly array: O; readonly key: O }
	| { readonly kind: 'arrayCount'; readonly array: O }
	/** Key and value at an insertion-order position, for `foreach` */
	| { readonly kind: 'arrayKeyAt'; readonly array: O; readonly index: O }
	| { readonly kind: 'arrayValueAt'; readonly array: O; readonly index: O }
	| { readonly kind: 'isNull'; readonly value: O }
	| { readonly kind: 'instanceOf'; readonly value: O; readonly className: string }
	/** The in-flight exception; first instruction of a landing block */
	| { readonly kind: 'caught' }

// ============================================================================
// Instructions and Terminators
// ============================================================================

export type Inst<O, D> =
	| {
			readonly kind: 'assign'
			/** `null` evaluates for effect only */
			readonly dest: D | null
			readonly type: PhpType
			readonly value: Rvalue<O>
			readonly loc: SourceLocation
	  }
	| {
			readonly kind: 'propSet'
			readonly object: O
			readonly className: string
			readonly name: string
			readonly slot: number
			readonly value: O
			readonly loc: SourceLocation
	  }
	| { readonly kind: 'echo'; readonly value: O; readonly loc: SourceLocation }

export type Terminator<O, D> =
	| { readonly kind: 'jump'; readonly target: BlockId }
	| {
			readonly kind: 'branch'
			readonly cond: O
			readonly then: BlockId
			readonly else: BlockId
			readonly loc: SourceLocation
	  }
	| { readonly kind: 'return'; readonly value: O | null; readonly loc: SourceLocation }
	| {
			readonly kind: 'throw'
			readonly value: O
			/** Landing block of the enclosing handler; `null` leaves the function */
			readonly unwind: BlockId | null
			readonly loc: SourceLocation
	  }
	/** A throwing operation inside a protected region */
	| {
			readonly kind: 'invoke'
			readonly dest: D | null
			readonly type: PhpType
			readonly value: Rvalue<O>
			readonly normal: BlockId
			readonly unwind: BlockId
			readonly loc: SourceLocation
	  }
	| { readonly kind: 'unreachable' }

export interface Edge {
	readonly target: BlockId
	readonly kind: 'normal' | 'exception'
}

export function successors<O, D>(terminator: Terminator<O, D>): Edge[] {
	switch (terminator.kind) {
		case 'jump':
			return [{ kind: 'normal', target: terminator.target }]
		case 'branch':
			return [
				{ kind: 'normal', target: terminator.then },
				{ kind: 'normal', target: terminator.else },
			]
		case 'invoke':
			return [
				{ kind: 'normal', target: terminator.normal },
				{ kind: 'exception', target: terminator.unwind },
			]
		case 'throw':
			return terminator.unwind === null ? [] : [{ kind: 'exception', target: terminator.unwind }]
		case 'return':
		case 'unreachable':
			return []
	}
}

// ============================================================================
// Graph
// ============================================================================

export interface BasicBlock<O, D> {
	readonly id: BlockId
	readonly insts: readonly Inst<O, D>[]
	readonly terminator: Terminator<O, D>
	/** Predecessors in a stable order: block order, then successor order */
	readonly preds: readonly BlockId[]
}

export interface CfgParam {
	readonly name: string
	readonly type: PhpType
}

export interface CfgFunction {
	readonly name: string
	readonly unit: string
	readonly loc: SourceLocation
	readonly params: readonly CfgParam[]
	readonly returnType: PhpType
	/** Type of every variable, compiler temporaries included */
	readonly locals: ReadonlyMap<string, PhpType>
	/** Entry block first */
	readonly blocks: readonly BasicBlock<Operand, string>[]
	readonly thisClass: string | null
}

export type CfgBlock = BasicBlock<Operand, string>
export type CfgInst = Inst<Operand, string>
export type CfgTerminator = Terminator<Operand, string>

/**
 * Operands an rvalue reads, in evaluation order.
 */
export function rvalueOperands<O>(value: Rvalue<O>): O[] {
	switch (value.kind) {
		case 'use':
			return [value.value]
		case 'binary':
			return [value.left, value.right]
		case 'unary':
			return [value.operand]
		case 'convert':
		case 'isNull':
		case 'instanceOf':
			return [value.value]
		case 'call':
		case 'builtin':
			return [...value.args]
		case 'methodCall':
		case 'dynMethodCall':
			return [value.object, ...value.args]
		case 'propGet':
		case 'dynPropGet':
			return [value.object]
		case 'arraySet':
			return [value.array, value.key, value.value]
		case 'arrayPush':
			return [value.array, value.value]
		case 'arrayUnset':
		case 'arrayGet':
		case 'arrayHas':
			return [value.array, value.key]
		case 'arrayCount':
			return [value.array]
		case 'arrayKeyAt':
		case 'arrayValueAt':
			return [value.array, value.index]
		case 'new':
		case 'arrayNew':
		case 'caught':
			return []
	}
}

/**
 * Rebuild an rvalue with every operand passed through `f`.
 */
export function mapRvalue<A, B>(value: Rvalue<A>, f: (operand: A) => B): Rvalue<B> {
	switch (value.kind) {
		case 'use':
			return { kind: 'use', value: f(value.value) }
		case 'binary':
			return { ...value, left: f(value.left), right: f(value.right) }
		case 'unary':
			return { ...value, operand: f(value.operand) }
		case 'convert':
			return { ...value, value: f(value.value) }
		case 'isNull':
			return { kind: 'isNull', value: f(value.value) }
		case 'instanceOf':
			return { ...value, value: f(value.value) }
		case 'call':
			return { ...value, args: value.args.map(f) }
		case 'builtin':
			return { ...value, args: value.args.map(f) }
		case 'methodCall':
			return { ...value, args: value.args.map(f), object: f(value.object) }
		case 'dynMethodCall':
			return { ...value, args: value.args.map(f), object: f(value.object) }
		case 'propGet':
			return { ...value, object: f(value.object) }
		case 'dynPropGet':
			return { ...value, object: f(value.object) }
		case 'arraySet':
			return { array: f(value.array), key: f(value.key), kind: 'arraySet', value: f(value.value) }
		case 'arrayPush':
			return { array: f(value.array), kind: 'arrayPush', value: f(value.value) }
		case 'arrayUnset':
			return { array: f(value.array), key: f(value.key), kind: 'arrayUnset' }
		case 'arrayGet':
			return { array: f(value.array), key: f(value.key), kind: 'arrayGet' }
		case 'arrayHas':
			return { array: f(value.array), key: f(value.key), kind: 'arrayHas' }
		case 'arrayCount':
			return { array: f(value.array), kind: 'arrayCount' }
		case 'arrayKeyAt':
			return { array: f(value.array), index: f(value.index), kind: 'arrayKeyAt' }
		case 'arrayValueAt':
			return { array: f(value.array), index: f(value.index), kind: 'arrayValueAt' }
		case 'new':
		case 'arrayNew':
		case 'caught':
			return value
	}
}

export function instOperands<O, D>(inst: Inst<O, D>): O[] {
	switch (inst.kind) {
		case 'assign':
			return rvalueOperands(inst.value)
		case 'propSet':
			return [inst.object, inst.value]
		case 'echo':
			return [inst.value]
	}
}

export function terminatorOperands<O, D>(terminator: Terminator<O, D>): O[] {
	switch (terminator.kind) {
		case 'branch':
			return [terminator.cond]
		case 'return':
			return terminator.value === null ? [] : [terminator.value]
		case 'throw':
			return [terminator.value]
		case 'invoke':
			return rvalueOperands(terminator.value)
		case 'jump':
		case 'unreachable':
			return []
	}
}

/**
 * Stable predecessor lists for `blocks`: scanned in block order, each
 * block's successors in terminator order.
 */
export function computePreds<O, D>(
	blocks: readonly { id: BlockId; terminator: Terminator<O, D> }[]
): Map<BlockId, BlockId[]> {
	const preds = new Map<BlockId, BlockId[]>()
	for (const block of blocks) preds.set(block.id, [])
	for (const block of blocks) {
		for (const edge of successors(block.terminator)) {
			const list = preds.get(edge.target)
			if (list !== undefined && !list.includes(block.id)) list.push(block.id)
		}
	}
	return preds
}
