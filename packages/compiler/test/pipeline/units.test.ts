import assert from 'node:assert'
import { describe, it } from 'node:test'
import { CompileCancelledError, CompileError } from '../../src/core/errors.ts'
import type { IrModule } from '../../src/ir/types.ts'
import { compile } from '../../src/pipeline/compile.ts'
import { compileAndRun, compileUnits } from '../../src/pipeline/units.ts'
import type { ForeignFunction } from '../../src/runtime/interpreter.ts'
import { compileSource, run } from '../helpers.ts'

const MAIN = { filename: 'main.php', source: "<?php require_once 'util.php'; echo answer();" }
const UTIL = { filename: 'util.php', source: '<?php function answer(): int { return 42; }' }

function rejectsWith(code: string, message: string): (error: unknown) => boolean {
	return (error) => {
		assert.ok(error instanceof CompileError)
		assert.deepStrictEqual(
			error.diagnostics.map((d) => [d.def.code, d.message]),
			[[code, message]]
		)
		return true
	}
}

describe('pipeline/units', () => {
	describe('compileUnits', () => {
		it('should compile dependencies first', async () => {
			const units = await compileUnits([MAIN, UTIL])
			assert.deepStrictEqual(
				units.map((unit) => unit.name),
				['util', 'main']
			)
			assert.deepStrictEqual(units[1]?.module.requires, ['util'])
		})

		it('should let a unit call into the units it requires', async () => {
			const result = await compileAndRun([MAIN, UTIL])
			assert.strictEqual(result.output, '42')
			assert.deepStrictEqual(result.leaks, [])
		})

		it('should report a dependency that was not supplied', async () => {
			await assert.rejects(compileUnits([MAIN]), rejectsWith('KLUNIT001', 'unit `main` depends on unknown unit `util`'))
		})

		it('should report a dependency cycle', async () => {
			const units = [
				{ filename: 'a.php', source: "<?php require_once 'b.php';" },
				{ filename: 'b.php', source: "<?php require_once 'a.php';" },
			]
			await assert.rejects(compileUnits(units), rejectsWith('KLUNIT002', 'dependency cycle: a -> b -> a'))
		})

		it('should reject require_once in a single-unit compile', async () => {
			await assert.rejects(compileSource(MAIN.source), rejectsWith('KLUNIT001', 'unit `main.php` depends on unknown unit `util.php`'))
		})
	})

	describe('cancellation', () => {
		it('should not start when the signal has already fired', async () => {
			await assert.rejects(compileSource('<?php echo 1;', { signal: AbortSignal.abort() }), CompileCancelledError)
		})

		it('should stop at the next stage boundary', async () => {
			const controller = new AbortController()
			const pending = compile('<?php echo 1;', { filename: 'main.php', signal: controller.signal })
			controller.abort()
			await assert.rejects(pending, (error: unknown) => {
				assert.ok(error instanceof CompileCancelledError)
				assert.strictEqual(error.message, 'compilation of main.php cancelled before resolution')
				assert.strictEqual(error.unit, 'main.php')
				return true
			})
		})

		it('should cancel every unit of a wave', async () => {
			const controller = new AbortController()
			const pending = compileUnits([MAIN, UTIL], { signal: controller.signal })
			controller.abort()
			await assert.rejects(pending, CompileCancelledError)
		})
	})

	describe('options', () => {
		it('should hand the verified module to the optimizer and keep its result', async () => {
			const seen: string[] = []
			const optimizer = (module: IrModule): IrModule => {
				seen.push(module.name)
				return { ...module, target: 'optimized' }
			}
			const unit = await compileSource('<?php echo 1;', { optimizer })
			assert.deepStrictEqual(seen, ['main'])
			assert.strictEqual(unit.module.target, 'optimized')
		})

		it('should record the target and runtime settings on the module', async () => {
			const unit = await compileSource('<?php echo 1;', { runtime: { ssoThreshold: 15 }, target: 'aarch64-unknown-linux-gnu' })
			assert.strictEqual(unit.module.target, 'aarch64-unknown-linux-gnu')
			assert.deepStrictEqual(unit.module.runtime, {
				atomicRefCounts: false,
				gcMode: 'refcount',
				hashPolicy: 'robin-hood',
				ssoThreshold: 15,
			})
		})
	})

	describe('compileAndRun', () => {
		it('should call foreign functions through their symbol', async () => {
			const cos: ForeignFunction = ([x]) => (typeof x === 'number' ? Math.cos(x) : undefined)
			const source = `<?php
#[ffi("libm.so.6", "double cos(double)")]
function cos_native(float $x): float;
echo cos_native(0.0);`
			const result = await run(source, { foreign: new Map([['cos', cos]]) })
			assert.strictEqual(result.output, '1')
		})

		it('should raise TypeError when a function falls off its end', async () => {
			const result = await run('<?php function f(bool $c): int { if ($c) { return 1; } } echo f(false);')
			assert.deepStrictEqual(result.uncaught, {
				className: 'TypeError',
				message: 'f(): Return value must be of type int, none returned',
			})
			assert.deepStrictEqual(result.leaks, [])
		})

		it('should report an uncaught exception with its message', async () => {
			const result = await run("<?php echo 'a'; throw new Exception('boom'); echo 'b';")
			assert.strictEqual(result.output, 'a')
			assert.deepStrictEqual(result.uncaught, { className: 'Exception', message: 'boom' })
		})

		it('should stream output as it is produced', async () => {
			const chunks: string[] = []
			await run("<?php echo 'x', 'y';", { onOutput: (text) => chunks.push(text) })
			assert.deepStrictEqual(chunks, ['x', 'y'])
		})

		it('should stop a program that runs past the step limit', async () => {
			await assert.rejects(run('<?php while (true) { }', { maxSteps: 1000 }), /step limit exceeded/)
		})
	})
})
