import assert from 'node:assert'
import { describe, it } from 'node:test'
import { printCfg } from '../../src/cfg/printer.ts'
import { successors } from '../../src/cfg/types.ts'
import { cfgOf, normalizeSource } from '../helpers.ts'

describe('cfg/normalize', () => {
	it('should keep a straight-line function in one block', async () => {
		const fn = await cfgOf('<?php function add(int $a, int $b): int { return $a + $b; }', 'add')
		assert.strictEqual(
			printCfg(fn),
			['function add($a: int, $b: int): int {', 'bb0:', '  %n0: int = add.int $a, $b', '  return %n0', '}'].join('\n')
		)
	})

	it('should put the top-level code first, then functions', async () => {
		const unit = await normalizeSource('<?php function f(): void {} f();')
		assert.deepStrictEqual(
			unit.functions.map((fn) => fn.name),
			['__main@main', 'f']
		)
	})

	it('should split an if statement into a diamond', async () => {
		const fn = await cfgOf(
			'<?php function sign(int $x): int { if ($x < 0) { $s = -1; } else { $s = 1; } return $s; }',
			'sign'
		)
		assert.strictEqual(fn.blocks.length, 4)
		const [entry, , , join] = fn.blocks
		assert.strictEqual(entry?.terminator.kind, 'branch')
		assert.strictEqual(join?.preds.length, 2)
		assert.strictEqual(join?.terminator.kind, 'return')
	})

	it('should give a loop header a back edge', async () => {
		const fn = await cfgOf(
			'<?php function count_to(int $n): int { $i = 0; while ($i < $n) { $i = $i + 1; } return $i; }',
			'count_to'
		)
		const header = fn.blocks.find((block) => block.terminator.kind === 'branch')
		assert.ok(header)
		assert.strictEqual(header.preds.length, 2)
		assert.ok(header.preds.some((pred) => pred > header.id))
	})

	it('should list predecessors consistently with successors', async () => {
		const fn = await cfgOf(
			`<?php
function f(int $x): int {
	$r = 0;
	for ($i = 0; $i < $x; $i++) {
		if ($i % 2 === 0) { continue; }
		$r += $i;
		if ($r > 10) { break; }
	}
	return $r;
}`,
			'f'
		)
		for (const block of fn.blocks) {
			for (const edge of successors(block.terminator)) {
				const target = fn.blocks.find((b) => b.id === edge.target)
				assert.ok(target?.preds.includes(block.id), `bb${block.id} -> bb${edge.target}`)
			}
		}
	})

	it('should send throwing calls inside try through invoke', async () => {
		const fn = await cfgOf(
			'<?php function risky(): int { return 1; } function safe(): int { try { return risky(); } catch (Exception $e) { return 0; } }',
			'safe'
		)
		const invokes = fn.blocks.filter((block) => block.terminator.kind === 'invoke')
		assert.strictEqual(invokes.length, 1)
		const landing = fn.blocks.find((block) => block.insts[0]?.kind === 'assign' && block.insts[0].value.kind === 'caught')
		assert.ok(landing)
		assert.deepStrictEqual(landing.preds, [invokes[0]?.id])
	})

	it('should drop blocks nothing reaches', async () => {
		const fn = await cfgOf('<?php function f(): int { return 1; echo 2; }', 'f')
		assert.strictEqual(fn.blocks.length, 1)
	})
})
