import assert from 'node:assert'
import { join } from 'node:path'
import { describe, it } from 'node:test'
import { CompileError, compile } from '@keel/compiler'
import {
	formatCompileError,
	formatInvalidTargetError,
	formatLeaks,
	formatReadError,
	formatUncaught,
	formatWriteError,
	getErrorMessage,
	getOutputContent,
	isNodeError,
	isValidTarget,
	loadUnits,
	resolveOutputFilename,
	resolveOutputPath,
} from '../src/utils.ts'

describe('isNodeError', () => {
	it('should return true for Error with code property', () => {
		const error = new Error('test') as NodeJS.ErrnoException
		error.code = 'ENOENT'
		assert.strictEqual(isNodeError(error), true)
	})

	it('should return false for plain Error', () => {
		assert.strictEqual(isNodeError(new Error('test')), false)
	})

	it('should return false for non-Error', () => {
		assert.strictEqual(isNodeError('string'), false)
		assert.strictEqual(isNodeError(null), false)
		assert.strictEqual(isNodeError(42), false)
	})
})

describe('getErrorMessage', () => {
	it('should extract message from Error', () => {
		assert.strictEqual(getErrorMessage(new Error('test message')), 'test message')
	})

	it('should convert non-Error to string', () => {
		assert.strictEqual(getErrorMessage('string error'), 'string error')
		assert.strictEqual(getErrorMessage(null), 'null')
	})
})

describe('formatReadError', () => {
	it('should report a missing file with its path', () => {
		const error = new Error('no such file') as NodeJS.ErrnoException
		error.code = 'ENOENT'
		assert.strictEqual(formatReadError('/path/to/main.php', error), '[KLCLI001] file not found: /path/to/main.php')
	})

	it('should report other errors with their reason', () => {
		const error = new Error('permission denied') as NodeJS.ErrnoException
		error.code = 'EACCES'
		assert.strictEqual(formatReadError('/path/to/main.php', error), '[KLCLI002] cannot read file: permission denied')
	})
})

describe('formatWriteError', () => {
	it('should include the reason', () => {
		assert.strictEqual(formatWriteError(new Error('disk full')), '[KLCLI003] cannot write file: disk full')
	})
})

describe('formatInvalidTargetError', () => {
	it('should quote the target', () => {
		assert.strictEqual(formatInvalidTargetError('wasm'), '[KLCLI004] unknown target "wasm"')
	})
})

describe('formatCompileError', () => {
	it('should return CompileError message directly', () => {
		assert.strictEqual(formatCompileError(new CompileError('main.php:1:7: error')), 'main.php:1:7: error')
	})

	it('should wrap other errors', () => {
		assert.strictEqual(
			formatCompileError(new Error('something went wrong')),
			'[KLCLI005] compilation failed: something went wrong'
		)
	})
})

describe('runtime messages', () => {
	it('should name the uncaught class', () => {
		assert.strictEqual(
			formatUncaught({ className: 'RuntimeException', message: 'boom' }),
			'[KLCLI006] uncaught RuntimeException: boom'
		)
	})

	it('should count live cells', () => {
		assert.strictEqual(formatLeaks(3), '[KLCLI007] program finished with 3 live heap cell(s)')
	})
})

describe('isValidTarget', () => {
	it('should accept the three dump formats', () => {
		assert.strictEqual(isValidTarget('ir'), true)
		assert.strictEqual(isValidTarget('cfg'), true)
		assert.strictEqual(isValidTarget('ssa'), true)
	})

	it('should reject anything else', () => {
		assert.strictEqual(isValidTarget('wat'), false)
		assert.strictEqual(isValidTarget('IR'), false)
		assert.strictEqual(isValidTarget(''), false)
	})
})

describe('resolveOutputFilename', () => {
	it('should replace the .php extension', () => {
		assert.strictEqual(resolveOutputFilename('src/main.php', 'ir'), 'main.ir')
		assert.strictEqual(resolveOutputFilename('main.php', 'ssa'), 'main.ssa')
	})

	it('should append to names without .php', () => {
		assert.strictEqual(resolveOutputFilename('script', 'cfg'), 'script.cfg')
	})
})

describe('resolveOutputPath', () => {
	it('should default to the current directory', () => {
		assert.strictEqual(resolveOutputPath('src/main.php', undefined, 'ir'), 'main.ir')
	})

	it('should join the output directory', () => {
		assert.strictEqual(resolveOutputPath('src/main.php', 'build', 'cfg'), join('build', 'main.cfg'))
	})
})

describe('getOutputContent', () => {
	it('should print the module header for ir', async () => {
		const unit = await compile('<?php echo 1;', { filename: 'demo.php' })
		const text = getOutputContent(unit, 'ir')
		assert.ok(text.startsWith('; module demo\n; target x86_64-unknown-linux-gnu\n; entry @__main@demo\n'))
		assert.ok(text.endsWith('}\n'))
	})

	it('should print one function per block list for cfg and ssa', async () => {
		const unit = await compile('<?php function two(): int { return 2; } echo two();', { filename: 'demo.php' })
		for (const target of ['cfg', 'ssa'] as const) {
			const text = getOutputContent(unit, target)
			assert.strictEqual(text.match(/^function /gm)?.length, 2)
			assert.ok(text.endsWith('}\n'))
		}
	})
})

describe('loadUnits', () => {
	const files = new Map([
		[join('app', 'main.php'), "<?php require_once 'lib/util.php'; require_once 'lib/util.php'; echo twice(2);"],
		[join('app', 'lib', 'util.php'), "<?php require_once 'base.php'; function twice(int $n): int { return base() * $n; }"],
		[join('app', 'lib', 'base.php'), '<?php function base(): int { return 2; }'],
	])
	const read = async (path: string): Promise<string> => {
		const source = files.get(path)
		if (source === undefined) {
			const error = new Error(`ENOENT: ${path}`) as NodeJS.ErrnoException
			error.code = 'ENOENT'
			error.path = path
			throw error
		}
		return source
	}

	it('should follow requires relative to the requiring file', async () => {
		const units = await loadUnits(join('app', 'main.php'), read)
		assert.deepStrictEqual(
			units.map((unit) => unit.filename),
			[join('app', 'main.php'), join('app', 'lib', 'util.php'), join('app', 'lib', 'base.php')]
		)
	})

	it('should surface a missing dependency as a read error', async () => {
		files.delete(join('app', 'lib', 'base.php'))
		await assert.rejects(loadUnits(join('app', 'main.php'), read), (error: unknown) => {
			return isNodeError(error) && error.path === join('app', 'lib', 'base.php')
		})
	})
})
