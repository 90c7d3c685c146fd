import assert from 'node:assert'
import { describe, it } from 'node:test'
import { blockId } from '../../src/cfg/types.ts'
import { InternalCompilerError } from '../../src/core/errors.ts'
import { cfgSuccessors, computeDominators } from '../../src/ssa/dominance.ts'
import { printSsa } from '../../src/ssa/printer.ts'
import { verifySsa } from '../../src/ssa/verify.ts'
import { cfgOf, ssaOf } from '../helpers.ts'

const COUNT_TO = '<?php function count_to(int $n): int { $i = 0; while ($i < $n) { $i = $i + 1; } return $i; }'

describe('ssa/builder', () => {
	it('should number parameters first and need no phis in straight-line code', async () => {
		const fn = await ssaOf('<?php function add(int $a, int $b): int { return $a + $b; }', 'add')
		assert.strictEqual(
			printSsa(fn),
			['function add(%0 $a: int, %1 $b: int): int {', 'bb0:', '  %2: int = add.int %0, %1', '  return %2', '}'].join(
				'\n'
			)
		)
		assert.strictEqual(fn.blocks.length, 1)
		assert.deepStrictEqual(
			fn.blocks.flatMap((block) => block.phis),
			[]
		)
	})

	it('should merge a loop variable at the loop header', async () => {
		const fn = await ssaOf(COUNT_TO, 'count_to')
		const header = fn.blocks[1]
		assert.ok(header)
		assert.deepStrictEqual(
			header.phis.map((phi) => phi.variable),
			['i']
		)
		const [phi] = header.phis
		assert.deepStrictEqual(
			phi?.incoming.map((incoming) => incoming.block),
			[0, 2]
		)
		const initial = phi?.incoming[0]?.value
		assert.ok(initial?.kind === 'const' && initial.value.kind === 'int')
		assert.strictEqual(initial.value.value, 0n)
	})

	it('should drop phis nothing reads', async () => {
		const fn = await ssaOf(
			'<?php function f(bool $c): int { if ($c) { $t = 1; } else { $t = 2; } return 0; }',
			'f'
		)
		assert.deepStrictEqual(
			fn.blocks.flatMap((block) => block.phis),
			[]
		)
	})

	it('should pass verification', async () => {
		verifySsa(await ssaOf(COUNT_TO, 'count_to'))
	})
})

describe('ssa/verify', () => {
	it('should reject a phi missing an incoming value', async () => {
		const fn = await ssaOf(COUNT_TO, 'count_to')
		const broken = {
			...fn,
			blocks: fn.blocks.map((block) => ({
				...block,
				phis: block.phis.map((phi) => ({ ...phi, incoming: phi.incoming.slice(1) })),
			})),
		}
		assert.throws(() => verifySsa(broken), (error: unknown) => {
			assert.ok(error instanceof InternalCompilerError)
			assert.match(error.message, /has 1 operand\(s\) for 2 predecessor\(s\)/)
			return true
		})
	})
})

describe('ssa/dominance', () => {
	it('should compute immediate dominators of a loop', async () => {
		const fn = await cfgOf(COUNT_TO, 'count_to')
		const tree = computeDominators(fn.blocks, cfgSuccessors(fn.blocks))
		assert.deepStrictEqual([...tree.idom.entries()].sort(([a], [b]) => a - b), [
			[0, 0],
			[1, 0],
			[2, 1],
			[3, 1],
		])
		assert.strictEqual(tree.dominates(blockId(1), blockId(3)), true)
		assert.strictEqual(tree.dominates(blockId(2), blockId(3)), false)
	})
})
