/**
 * SSA form of a control-flow graph.
 *
 * Values are numbered per function. Each is defined once: by a parameter,
 * a phi, an `assign` destination or an `invoke` destination. The result of
 * an `invoke` is available in its normal successor only.
 */

import type { PhpType } from '../check/types.ts'
import type { SourceLocation } from '../core/location.ts'
import type { BasicBlock, BlockId, ConstOperand, Inst, Terminator } from '../cfg/types.ts'

export type ValueId = number

export interface ValueOperand {
	readonly kind: 'value'
	readonly id: ValueId
	readonly type: PhpType
}

export type SsaOperand = ValueOperand | ConstOperand

export interface PhiIncoming {
	readonly block: BlockId
	readonly value: SsaOperand
}

export interface Phi {
	readonly dest: ValueId
	readonly type: PhpType
	/** Source variable the phi merges */
	readonly variable: string
	/** One entry per predecessor, in the block's predecessor order */
	readonly incoming: readonly PhiIncoming[]
}

export interface SsaBlock extends BasicBlock<SsaOperand, ValueId> {
	readonly phis: readonly Phi[]
}

export type SsaInst = Inst<SsaOperand, ValueId>
export type SsaTerminator = Terminator<SsaOperand, ValueId>

export interface SsaParam {
	readonly name: string
	readonly type: PhpType
	readonly value: ValueId
}

export interface SsaFunction {
	readonly name: string
	readonly unit: string
	readonly loc: SourceLocation
	readonly params: readonly SsaParam[]
	readonly returnType: PhpType
	/** Entry block first */
	readonly blocks: readonly SsaBlock[]
	readonly thisClass: string | null
	/** Type of every value */
	readonly values: ReadonlyMap<ValueId, PhpType>
	/** Source variable each value is a version of */
	readonly names: ReadonlyMap<ValueId, string>
}

export function valueOperand(id: ValueId, type: PhpType): ValueOperand {
	return { id, kind: 'value', type }
}
