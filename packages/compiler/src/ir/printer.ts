/**
 * Text form of IR modules, for tests and `--emit ir`.
 */

import { formatFloat } from '../check/values.ts'
import type { Callee, CallInst, IrClass, IrExtern, IrFunction, IrInst, IrModule, IrTerminator } from './types.ts'

function v(value: number): string {
	return `%${value}`
}

function formatLiteral(value: bigint | number | boolean | string | null): string {
	if (value === null) return 'null'
	if (typeof value === 'string') return JSON.stringify(value)
	if (typeof value === 'number') return formatFloat(value)
	return String(value)
}

function formatCallee(callee: Callee): string {
	return callee.kind === 'direct' ? `@${callee.name}` : v(callee.value)
}

function formatCall(call: CallInst): string {
	const cleanup = call.cleanup.length === 0 ? '' : ` cleanup [${call.cleanup.map(v).join(', ')}]`
	return `call ${formatCallee(call.callee)}(${call.args.map(v).join(', ')})${cleanup}`
}

export function formatIrInst(inst: IrInst): string {
	const def = (result: number, type: string, rhs: string) => `${v(result)}: ${type} = ${rhs}`
	switch (inst.op) {
		case 'const':
			return def(inst.result, inst.type, `const ${formatLiteral(inst.value)}`)
		case 'arith':
			return def(inst.result, inst.type, `${inst.kind} ${v(inst.left)}, ${v(inst.right)}`)
		case 'icmp':
		case 'fcmp':
			return def(inst.result, inst.type, `${inst.op} ${inst.predicate} ${v(inst.left)}, ${v(inst.right)}`)
		case 'unop':
		case 'cast':
			return def(inst.result, inst.type, `${inst.kind} ${v(inst.operand)}`)
		case 'call':
			return inst.result === null ? formatCall(inst) : def(inst.result, inst.type, formatCall(inst))
		case 'vtable_load':
			return def(inst.result, inst.type, `vtable_load ${v(inst.object)}, ${inst.slot}`)
		case 'method_lookup':
			return def(inst.result, inst.type, `method_lookup ${v(inst.object)}, ${inst.method}`)
		case 'field_load':
			return def(inst.result, inst.type, `field_load ${v(inst.object)}, ${inst.className}#${inst.slot}`)
		case 'field_store':
			return `field_store ${v(inst.object)}, ${inst.className}#${inst.slot}, ${v(inst.value)}`
		case 'object_new':
			return def(inst.result, inst.type, `object_new ${inst.className}`)
		case 'instance_of':
			return def(inst.result, inst.type, `instance_of ${v(inst.value)}, ${inst.className}`)
		case 'rc_inc':
		case 'rc_dec':
			return `${inst.op} ${v(inst.value)}`
		case 'landingpad':
			return def(inst.result, inst.type, 'landingpad')
		case 'phi':
			return def(
				inst.result,
				inst.type,
				`phi ${inst.incoming.map((edge) => `[bb${edge.block}: ${v(edge.value)}]`).join(', ')}`
			)
	}
}

export function formatIrTerminator(terminator: IrTerminator): string {
	switch (terminator.op) {
		case 'ret':
			return terminator.value === null ? 'ret' : `ret ${v(terminator.value)}`
		case 'br':
			return `br bb${terminator.target}`
		case 'condbr':
			return `condbr ${v(terminator.cond)}, bb${terminator.then}, bb${terminator.else}`
		case 'invoke': {
			const call = terminator.call
			const text = call.result === null ? formatCall(call) : `${v(call.result)}: ${call.type} = ${formatCall(call)}`
			return `invoke ${text} to bb${terminator.normal} unwind bb${terminator.unwind}`
		}
		case 'raise':
			return `raise ${v(terminator.value)}${terminator.unwind === null ? '' : ` unwind bb${terminator.unwind}`}`
		case 'unreachable':
			return 'unreachable'
	}
}

export function printIrFunction(fn: IrFunction): string {
	const params = fn.params.map((param) => `${v(param.id)} $${param.name}: ${param.type}`).join(', ')
	const lines = [`function @${fn.name}(${params}): ${fn.returnType} {`]
	for (const block of fn.blocks) {
		lines.push(`bb${block.id}:`)
		for (const inst of block.insts) lines.push(`  ${formatIrInst(inst)}`)
		lines.push(`  ${formatIrTerminator(block.terminator)}`)
	}
	lines.push('}')
	return lines.join('\n')
}

function printClass(cls: IrClass): string {
	const kind = cls.isInterface ? 'interface' : 'class'
	const parent = cls.parent === null ? '' : ` extends ${cls.parent}`
	const interfaces = cls.interfaces.length === 0 ? '' : ` implements ${cls.interfaces.join(', ')}`
	const lines = [`${kind} ${cls.name}${parent}${interfaces} {`]
	cls.slots.forEach((slot, i) => lines.push(`  slot ${i} ${slot.name}: ${slot.type}`))
	cls.vtable.forEach((impl, i) => lines.push(`  vtable ${i} @${impl}`))
	lines.push('}')
	return lines.join('\n')
}

function printExtern(ext: IrExtern): string {
	return `extern @${ext.name}(${ext.params.join(', ')}): ${ext.returnType} from "${ext.library}" symbol ${ext.symbol}`
}

export function printIrModule(module: IrModule): string {
	const header = [`; module ${module.name}`, `; target ${module.target}`, `; entry @${module.entry}`]
	if (module.requires.length > 0) header.push(`; requires ${module.requires.join(', ')}`)
	const sections = [
		header.join('\n'),
		...module.classes.map(printClass),
		...module.externs.map(printExtern),
		...module.functions.map(printIrFunction),
	]
	return sections.join('\n\n')
}
