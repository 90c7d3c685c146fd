import assert from 'node:assert'
import { describe, it } from 'node:test'
import fc from 'fast-check'
import { verifySsa } from '../../src/ssa/verify.ts'
import { compileSource } from '../helpers.ts'
import { straightLineProgram, structuredProgram } from '../programs.ts'

describe('ssa (property)', () => {
	it('should give every phi one incoming value per predecessor, in predecessor order', async () => {
		await fc.assert(
			fc.asyncProperty(structuredProgram, async (source) => {
				const unit = await compileSource(source)
				for (const fn of unit.ssa) {
					for (const block of fn.blocks) {
						for (const phi of block.phis) {
							assert.deepStrictEqual(
								phi.incoming.map((incoming) => incoming.block),
								block.preds
							)
						}
					}
					verifySsa(fn)
				}
			}),
			{ numRuns: 40 }
		)
	})

	it('should keep a function without control flow in one block with no phis', async () => {
		await fc.assert(
			fc.asyncProperty(straightLineProgram, async (source) => {
				const unit = await compileSource(source)
				const body = unit.ssa.find((fn) => fn.name === 'body')
				assert.ok(body)
				assert.strictEqual(body.blocks.length, 1)
				assert.deepStrictEqual(body.blocks[0]?.phis, [])
			}),
			{ numRuns: 40 }
		)
	})
})
