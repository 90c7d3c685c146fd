import assert from 'node:assert'
import { describe, it } from 'node:test'
import { CompilationContext, DiagnosticSeverity } from '../../src/core/context.ts'
import { createLocator } from '../../src/core/location.ts'

describe('core/context', () => {
	describe('DiagnosticSeverity', () => {
		it('should have correct values', () => {
			assert.strictEqual(DiagnosticSeverity.Error, 0)
			assert.strictEqual(DiagnosticSeverity.Warning, 1)
			assert.strictEqual(DiagnosticSeverity.Note, 2)
		})
	})

	describe('CompilationContext', () => {
		it('should store source and filename', () => {
			const ctx = new CompilationContext('<?php echo 1;', { filename: 'main.php' })
			assert.strictEqual(ctx.source, '<?php echo 1;')
			assert.strictEqual(ctx.filename, 'main.php')
		})

		it('should accept a bare filename', () => {
			assert.strictEqual(new CompilationContext('', 'lib.php').filename, 'lib.php')
		})

		it('should use default filename if not provided', () => {
			assert.strictEqual(new CompilationContext('').filename, '<input>')
		})

		it('should interpolate messages and record positions', () => {
			const ctx = new CompilationContext('<?php nope();', 'main.php')
			ctx.emit('KLRES001', 1, 7, { name: 'nope', what: 'function' })
			const [diagnostic] = ctx.getDiagnostics()
			assert.strictEqual(diagnostic?.message, 'unresolved function `nope`')
			assert.strictEqual(diagnostic?.file, 'main.php')
			assert.strictEqual(diagnostic?.line, 1)
			assert.strictEqual(diagnostic?.column, 7)
			assert.strictEqual(ctx.hasErrors(), true)
			assert.strictEqual(ctx.getErrorCount(), 1)
		})

		it('should keep warnings apart from errors', () => {
			const ctx = new CompilationContext('')
			ctx.emitAt('KLRES050', { column: 3, line: 1 }, { name: 'Pure' })
			assert.strictEqual(ctx.hasErrors(), false)
			assert.strictEqual(ctx.getWarnings().length, 1)
			assert.deepStrictEqual(ctx.getErrors(), [])
		})

		it('should drop errors past maxErrors and count them', () => {
			const ctx = new CompilationContext('', { maxErrors: 2 })
			for (let i = 1; i <= 5; i++) ctx.emit('KLRES001', i, 1, { name: `f${i}`, what: 'function' })
			ctx.emit('KLRES050', 6, 1, { name: 'Pure' })
			assert.strictEqual(ctx.getErrorCount(), 2)
			assert.strictEqual(ctx.getDroppedErrorCount(), 3)
			assert.strictEqual(ctx.isTruncated(), true)
			assert.strictEqual(ctx.getWarnings().length, 1)
		})
	})

	describe('formatting', () => {
		it('should render the source line, a caret and the help text', () => {
			const ctx = new CompilationContext('<?php\n  nope();', 'main.php')
			ctx.emit('KLRES001', 2, 3, { name: 'nope', what: 'function' })
			assert.strictEqual(
				ctx.formatAllDiagnostics(),
				[
					'error[KLRES001]: unresolved function `nope`',
					'  --> main.php:2:3',
					'   | ',
					' 2 |   nope();',
					'   |   ^',
					'   | ',
					'   = help: Declare `nope` or add the unit that declares it as a dependency.',
				].join('\n')
			)
		})

		it('should omit the source context past the end of the file', () => {
			const ctx = new CompilationContext('<?php', 'main.php')
			ctx.emit('KLRES001', 9, 1, { name: 'x', what: 'variable' })
			assert.strictEqual(ctx.formatAllDiagnostics(), 'error[KLRES001]: unresolved variable `x`\n  --> main.php:9:1')
		})

		it('should note dropped errors at the end', () => {
			const ctx = new CompilationContext('', { filename: 'a.php', maxErrors: 1 })
			ctx.emit('KLRES001', 5, 1, { name: 'a', what: 'function' })
			ctx.emit('KLRES001', 6, 1, { name: 'b', what: 'function' })
			assert.strictEqual(
				ctx.formatAllDiagnostics(),
				'error[KLRES001]: unresolved function `a`\n  --> a.php:5:1\n\nnote: 1 more error(s) not shown'
			)
		})
	})

	describe('createLocator', () => {
		it('should map offsets to 1-based lines and columns', () => {
			const locate = createLocator('ab\ncd\n\nef')
			assert.deepStrictEqual(locate(0), { column: 1, line: 1 })
			assert.deepStrictEqual(locate(4), { column: 2, line: 2 })
			assert.deepStrictEqual(locate(6), { column: 1, line: 3 })
			assert.deepStrictEqual(locate(8), { column: 2, line: 4 })
		})
	})
})
