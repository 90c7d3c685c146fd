/**
 * Dominator tree and dominance frontiers.
 *
 * Immediate dominators use the iterative algorithm of Cooper, Harvey and
 * Kennedy over reverse postorder. Blocks must all be reachable from the
 * entry, which is the first block. The same code serves the CFG, SSA and
 * IR: callers describe the edges with a successor function.
 */

import { type BlockId, type Terminator, successors } from '../cfg/types.ts'
import { InternalCompilerError } from '../core/errors.ts'

export interface GraphBlock<Id extends number = BlockId> {
	readonly id: Id
	readonly preds: readonly Id[]
}

export type Successors<Id extends number = BlockId> = (block: Id) => readonly Id[]

export interface DominatorTree<Id extends number = BlockId> {
	readonly entry: Id
	/** Reverse postorder from the entry */
	readonly order: readonly Id[]
	/** Immediate dominator; the entry maps to itself */
	readonly idom: ReadonlyMap<Id, Id>
	/** Dominator-tree children in reverse postorder */
	readonly children: ReadonlyMap<Id, readonly Id[]>
	dominates(a: Id, b: Id): boolean
}

/** Successor function of CFG and SSA blocks, exception edges included */
export function cfgSuccessors(
	blocks: readonly { id: BlockId; terminator: Terminator<unknown, unknown> }[]
): Successors {
	const targets = new Map(blocks.map((block) => [block.id, successors(block.terminator).map((edge) => edge.target)]))
	return (id) => targets.get(id) ?? []
}

export function reversePostorder<Id extends number>(blocks: readonly GraphBlock<Id>[], next: Successors<Id>): Id[] {
	const known = new Set(blocks.map((block) => block.id))
	const entry = blocks[0]
	if (entry === undefined) return []
	const seen = new Set<Id>([entry.id])
	const post: Id[] = []
	// Explicit stack: each frame holds the block and its remaining successors
	const stack: { id: Id; edges: Id[] }[] = [{ edges: [...next(entry.id)], id: entry.id }]
	while (stack.length > 0) {
		const frame = stack[stack.length - 1]
		if (frame === undefined) break
		const target = frame.edges.shift()
		if (target === undefined) {
			post.push(frame.id)
			stack.pop()
			continue
		}
		if (seen.has(target)) continue
		seen.add(target)
		if (!known.has(target)) throw new InternalCompilerError('dominance', `edge to missing block bb${target}`)
		stack.push({ edges: [...next(target)], id: target })
	}
	return post.reverse()
}

export function computeDominators<Id extends number>(
	blocks: readonly GraphBlock<Id>[],
	next: Successors<Id>
): DominatorTree<Id> {
	const order = reversePostorder(blocks, next)
	const entry = order[0]
	if (entry === undefined) throw new InternalCompilerError('dominance', 'function has no blocks')
	if (order.length !== blocks.length) {
		throw new InternalCompilerError('dominance', `${blocks.length - order.length} unreachable block(s)`)
	}
	const rank = new Map(order.map((id, i) => [id, i]))
	const byId = new Map(blocks.map((block) => [block.id, block]))
	const idom = new Map<Id, Id>([[entry, entry]])

	const position = (id: Id): number => rank.get(id) ?? -1
	const intersect = (a: Id, b: Id): Id => {
		let x = a
		let y = b
		while (x !== y) {
			while (position(x) > position(y)) x = idom.get(x) ?? entry
			while (position(y) > position(x)) y = idom.get(y) ?? entry
		}
		return x
	}

	let changed = true
	while (changed) {
		changed = false
		for (const id of order.slice(1)) {
			const preds = (byId.get(id)?.preds ?? []).filter((p) => idom.has(p))
			const [first, ...rest] = preds
			if (first === undefined) continue
			const dominator = rest.reduce(intersect, first)
			if (idom.get(id) !== dominator) {
				idom.set(id, dominator)
				changed = true
			}
		}
	}

	const children = new Map<Id, Id[]>(order.map((id) => [id, []]))
	for (const id of order.slice(1)) {
		const parent = idom.get(id)
		if (parent !== undefined) children.get(parent)?.push(id)
	}

	const depth = new Map<Id, number>([[entry, 0]])
	for (const id of order.slice(1)) {
		const parent = idom.get(id)
		depth.set(id, (parent === undefined ? 0 : (depth.get(parent) ?? 0)) + 1)
	}

	return {
		children,
		dominates(a: Id, b: Id): boolean {
			let node = b
			const target = depth.get(a) ?? 0
			while ((depth.get(node) ?? 0) > target) node = idom.get(node) ?? entry
			return node === a
		},
		entry,
		idom,
		order,
	}
}

/**
 * Dominance frontier of every block: the blocks where its dominance ends.
 */
export function dominanceFrontiers<Id extends number>(
	blocks: readonly GraphBlock<Id>[],
	tree: DominatorTree<Id>
): Map<Id, Set<Id>> {
	const frontiers = new Map<Id, Set<Id>>(blocks.map((block) => [block.id, new Set()]))
	for (const block of blocks) {
		if (block.preds.length < 2) continue
		const idom = tree.idom.get(block.id)
		for (const pred of block.preds) {
			let runner: Id | undefined = pred
			while (runner !== undefined && runner !== idom) {
				frontiers.get(runner)?.add(block.id)
				const up: Id | undefined = tree.idom.get(runner)
				runner = up === runner ? undefined : up
			}
		}
	}
	return frontiers
}

/**
 * Iterated dominance frontier of a set of definition sites.
 */
export function iteratedFrontier<Id extends number>(
	sites: Iterable<Id>,
	frontiers: ReadonlyMap<Id, Set<Id>>
): Set<Id> {
	const result = new Set<Id>()
	const work = [...sites]
	const queued = new Set(work)
	while (work.length > 0) {
		const block = work.pop()
		if (block === undefined) break
		for (const join of frontiers.get(block) ?? []) {
			if (result.has(join)) continue
			result.add(join)
			if (!queued.has(join)) {
				queued.add(join)
				work.push(join)
			}
		}
	}
	return result
}
