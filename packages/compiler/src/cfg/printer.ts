/**
 * Text form of control-flow graphs, for tests and `--emit cfg`.
 */

import { typeToString } from '../check/types.ts'
import { formatConst } from '../check/values.ts'
import type { BasicBlock, CfgFunction, Inst, Operand, Rvalue, Terminator } from './types.ts'

type Format<T> = (value: T) => string

export function formatOperand(operand: Operand): string {
	if (operand.kind === 'const') return formatConst(operand.value)
	return operand.name.startsWith('%') ? operand.name : `$${operand.name}`
}

function list<O>(values: readonly O[], fmt: Format<O>): string {
	return values.map(fmt).join(', ')
}

export function formatRvalue<O>(value: Rvalue<O>, fmt: Format<O>): string {
	switch (value.kind) {
		case 'use':
			return fmt(value.value)
		case 'binary':
			return `${value.op}.${typeToString(value.operandType)} ${fmt(value.left)}, ${fmt(value.right)}`
		case 'unary':
			return `${value.op} ${fmt(value.operand)}`
		case 'convert':
			return `${value.mode} ${typeToString(value.from)} -> ${typeToString(value.to)} ${fmt(value.value)}`
		case 'call':
			return `call ${value.callee}(${list(value.args, fmt)})`
		case 'builtin':
			return `builtin ${value.runtime}(${list(value.args, fmt)})`
		case 'new':
			return `new ${value.className}`
		case 'methodCall':
			return `${value.dispatch} ${value.className}.${value.target}(${list([value.object, ...value.args], fmt)})`
		case 'dynMethodCall':
			return `dyncall ${value.method}(${list([value.object, ...value.args], fmt)})`
		case 'propGet':
			return `getprop ${fmt(value.object)}.${value.name}#${value.slot}`
		case 'dynPropGet':
			return `dyngetprop ${fmt(value.object)}.${value.name}`
		case 'arrayNew':
			return 'array.new'
		case 'arraySet':
			return `array.set ${fmt(value.array)}[${fmt(value.key)}] = ${fmt(value.value)}`
		case 'arrayPush':
			return `array.push ${fmt(value.array)}[] = ${fmt(value.value)}`
		case 'arrayUnset':
			return `array.unset ${fmt(value.array)}[${fmt(value.key)}]`
		case 'arrayGet':
			return `array.get ${fmt(value.array)}[${fmt(value.key)}]`
		case 'arrayHas':
			return `array.has ${fmt(value.array)}[${fmt(value.key)}]`
		case 'arrayCount':
			return `array.count ${fmt(value.array)}`
		case 'arrayKeyAt':
			return `array.key_at ${fmt(value.array)}, ${fmt(value.index)}`
		case 'arrayValueAt':
			return `array.value_at ${fmt(value.array)}, ${fmt(value.index)}`
		case 'isNull':
			return `is_null ${fmt(value.value)}`
		case 'instanceOf':
			return `instanceof ${fmt(value.value)}, ${value.className}`
		case 'caught':
			return 'caught'
	}
}

export function formatInst<O, D>(inst: Inst<O, D>, fmt: Format<O>, dest: Format<D>): string {
	switch (inst.kind) {
		case 'assign': {
			const rhs = formatRvalue(inst.value, fmt)
			return inst.dest === null ? rhs : `${dest(inst.dest)}: ${typeToString(inst.type)} = ${rhs}`
		}
		case 'propSet':
			return `setprop ${fmt(inst.object)}.${inst.name}#${inst.slot} = ${fmt(inst.value)}`
		case 'echo':
			return `echo ${fmt(inst.value)}`
	}
}

export function formatTerminator<O, D>(terminator: Terminator<O, D>, fmt: Format<O>, dest: Format<D>): string {
	switch (terminator.kind) {
		case 'jump':
			return `jump bb${terminator.target}`
		case 'branch':
			return `branch ${fmt(terminator.cond)}, bb${terminator.then}, bb${terminator.else}`
		case 'return':
			return terminator.value === null ? 'return' : `return ${fmt(terminator.value)}`
		case 'throw':
			return `throw ${fmt(terminator.value)}${terminator.unwind === null ? '' : ` unwind bb${terminator.unwind}`}`
		case 'invoke': {
			const rhs = formatRvalue(terminator.value, fmt)
			const call = terminator.dest === null ? rhs : `${dest(terminator.dest)}: ${typeToString(terminator.type)} = ${rhs}`
			return `invoke ${call} to bb${terminator.normal} unwind bb${terminator.unwind}`
		}
		case 'unreachable':
			return 'unreachable'
	}
}

/**
 * Print blocks one per paragraph: a `bbN:` label with its predecessors,
 * the instructions, then the terminator.
 */
export function formatBlocks<O, D, B extends BasicBlock<O, D>>(
	blocks: readonly B[],
	fmt: Format<O>,
	dest: Format<D>,
	extra: (block: B) => readonly string[] = () => []
): string[] {
	const lines: string[] = []
	for (const block of blocks) {
		const preds = block.preds.length === 0 ? '' : `  ; preds ${block.preds.map((p) => `bb${p}`).join(', ')}`
		lines.push(`bb${block.id}:${preds}`)
		for (const line of extra(block)) lines.push(`  ${line}`)
		for (const inst of block.insts) lines.push(`  ${formatInst(inst, fmt, dest)}`)
		lines.push(`  ${formatTerminator(block.terminator, fmt, dest)}`)
	}
	return lines
}

function formatVar(name: string): string {
	return name.startsWith('%') ? name : `$${name}`
}

export function printCfg(fn: CfgFunction): string {
	const params = fn.params.map((p) => `$${p.name}: ${typeToString(p.type)}`).join(', ')
	const lines = [`function ${fn.name}(${params}): ${typeToString(fn.returnType)} {`]
	lines.push(...formatBlocks(fn.blocks, formatOperand, formatVar))
	lines.push('}')
	return lines.join('\n')
}
