import { mkdir, writeFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { type CompiledUnit, compileUnits, type UnitSource } from '@keel/compiler'
import {
	formatCompileError,
	formatInvalidTargetError,
	formatReadError,
	formatWriteError,
	getOutputContent,
	isNodeError,
	isValidTarget,
	loadUnits,
	OUTPUT_TARGETS,
	type OutputTarget,
	resolveOutputPath,
} from '../utils.ts'

export default class BuildCommand extends BaseCommand {
	static override commandName = 'build'
	static override description = 'Compile a PHP source file and the files it requires to IR'

	@args.string({ description: 'Input .php file to compile' })
	declare input: string

	@flags.string({ alias: 'o', description: 'Output directory (created if not exists)' })
	declare output?: string

	@flags.string({
		alias: 't',
		default: 'ir',
		description: `Output format: ${OUTPUT_TARGETS.join(', ')}`,
	})
	declare target: string

	private fail(message: string): null {
		this.logger.error(message)
		this.exitCode = 1
		return null
	}

	private async readSources(): Promise<UnitSource[] | null> {
		try {
			return await loadUnits(this.input)
		} catch (error: unknown) {
			if (isNodeError(error)) return this.fail(formatReadError(error.path ?? this.input, error))
			return this.fail(formatCompileError(error))
		}
	}

	private async compileSources(units: UnitSource[]): Promise<CompiledUnit[] | null> {
		try {
			return await compileUnits(units)
		} catch (error: unknown) {
			return this.fail(formatCompileError(error))
		}
	}

	private async emitOutput(unit: CompiledUnit, target: OutputTarget): Promise<boolean> {
		const outputPath = resolveOutputPath(unit.filename, this.output, target)
		try {
			await writeFile(outputPath, getOutputContent(unit, target))
		} catch (error: unknown) {
			this.fail(formatWriteError(error))
			return false
		}
		this.logger.success(`wrote ${outputPath}`)
		return true
	}

	override async run(): Promise<void> {
		const target = this.target
		if (!isValidTarget(target)) {
			this.fail(formatInvalidTargetError(target))
			return
		}

		const sources = await this.readSources()
		if (sources === null) return

		const compiled = await this.compileSources(sources)
		if (compiled === null) return

		try {
			await mkdir(this.output ?? '.', { recursive: true })
		} catch (error: unknown) {
			this.fail(formatWriteError(error))
			return
		}

		for (const unit of compiled) {
			if (unit.report !== '') this.logger.warning(unit.report)
			if (!(await this.emitOutput(unit, target))) return
		}
	}
}
