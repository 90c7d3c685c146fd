import assert from 'node:assert'
import { describe, it } from 'node:test'
import fc from 'fast-check'
import { callMayThrow } from '../../src/ir/abi.ts'
import { simulateRefCounts } from '../../src/ir/refcheck.ts'
import { compileSource, run } from '../helpers.ts'
import { structuredProgram } from '../programs.ts'

describe('lower/refcount (property)', () => {
	it('should balance every reference count on every path', async () => {
		await fc.assert(
			fc.asyncProperty(structuredProgram, async (source) => {
				const { module } = await compileSource(source)
				const mayThrow = callMayThrow(new Set(module.externs.map((ext) => ext.name)))
				for (const fn of module.functions) {
					assert.deepStrictEqual(simulateRefCounts(fn, mayThrow), [], fn.name)
				}
			}),
			{ numRuns: 40 }
		)
	})

	it('should free every heap cell by the end of the run', async () => {
		await fc.assert(
			fc.asyncProperty(structuredProgram, async (source) => {
				const result = await run(source)
				assert.strictEqual(result.uncaught, null)
				assert.deepStrictEqual(result.leaks, [])
			}),
			{ numRuns: 30 }
		)
	})
})
