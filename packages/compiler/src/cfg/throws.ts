/**
 * Which operations can raise an exception.
 *
 * Inside a `try` region every operation listed here ends its block with
 * an `invoke` so the exception edge is explicit in the graph.
 */

import type { PhpType } from '../check/types.ts'
import { runtimeMayThrow } from '../ir/abi.ts'
import type { Rvalue } from './types.ts'

interface Typed {
	readonly type: PhpType
}

export function mayThrow<O extends Typed>(value: Rvalue<O>, resultType: PhpType): boolean {
	switch (value.kind) {
		case 'call':
		case 'methodCall':
		case 'dynMethodCall':
		case 'dynPropGet':
			return true
		case 'builtin':
			return runtimeMayThrow(value.runtime)
		case 'convert':
			return value.from.kind === 'mixed' || value.from.kind === 'null'
		case 'binary':
			switch (value.op) {
				case 'div':
				case 'mod':
				case 'shl':
				case 'shr':
					return true
				case 'add':
				case 'sub':
				case 'mul':
				case 'pow':
					return value.operandType.kind === 'mixed'
				default:
					return false
			}
		case 'arrayGet':
			return resultType.kind === 'object'
		default:
			return false
	}
}
