/**
 * Edge normalization ahead of reference counting.
 *
 * A `condbr` whose arms meet becomes a `br`. Every normal edge from a
 * block with several successors into a block with several predecessors
 * gets a block of its own, so that references dropped along one edge
 * have a place to go.
 */

import {
	type IrBlock,
	type IrFunction,
	type IrInst,
	type IrTerminator,
	irPredecessors,
} from '../ir/types.ts'

function simplify(terminator: IrTerminator): IrTerminator {
	if (terminator.op === 'condbr' && terminator.then === terminator.else) return { op: 'br', target: terminator.then }
	return terminator
}

function renamePred(insts: readonly IrInst[], from: number, to: number): IrInst[] {
	return insts.map((inst) =>
		inst.op === 'phi'
			? {
					...inst,
					incoming: inst.incoming.map((edge) => (edge.block === from ? { block: to, value: edge.value } : edge)),
				}
			: inst
	)
}

export function splitCriticalEdges(fn: IrFunction): IrFunction {
	const blocks = new Map<number, IrBlock>(
		fn.blocks.map((block) => [block.id, { ...block, terminator: simplify(block.terminator) }])
	)
	const simplified: IrFunction = { ...fn, blocks: [...blocks.values()] }
	const preds = irPredecessors(simplified)
	let nextId = Math.max(-1, ...fn.blocks.map((block) => block.id)) + 1
	const added: IrBlock[] = []

	const split = (from: number, to: number): number => {
		const edge: IrBlock = { id: nextId++, insts: [], terminator: { op: 'br', target: to } }
		added.push(edge)
		const target = blocks.get(to)
		if (target !== undefined) blocks.set(to, { ...target, insts: renamePred(target.insts, from, edge.id) })
		return edge.id
	}
	const critical = (target: number) => (preds.get(target)?.length ?? 0) > 1

	for (const block of simplified.blocks) {
		const terminator = block.terminator
		let replaced: IrTerminator | null = null
		if (terminator.op === 'condbr') {
			const then = critical(terminator.then) ? split(block.id, terminator.then) : terminator.then
			const otherwise = critical(terminator.else) ? split(block.id, terminator.else) : terminator.else
			replaced = { ...terminator, else: otherwise, then }
		} else if (terminator.op === 'invoke' && critical(terminator.normal)) {
			replaced = { ...terminator, normal: split(block.id, terminator.normal) }
		}
		if (replaced !== null) {
			const current = blocks.get(block.id)
			if (current !== undefined) blocks.set(block.id, { ...current, terminator: replaced })
		}
	}
	return { ...fn, blocks: [...blocks.values(), ...added] }
}
