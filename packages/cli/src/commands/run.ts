import { args, BaseCommand, flags } from '@adonisjs/ace'
import { compileAndRun, type ExecutionResult, type UnitSource } from '@keel/compiler'
import {
	formatCompileError,
	formatLeaks,
	formatReadError,
	formatUncaught,
	isNodeError,
	loadUnits,
} from '../utils.ts'

export default class RunCommand extends BaseCommand {
	static override commandName = 'run'
	static override description = 'Compile a PHP source file and execute it on the reference runtime'

	@args.string({ description: 'Input .php file to run' })
	declare input: string

	@flags.boolean({ description: 'List the heap cells still live when the program ends' })
	declare leaks: boolean

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

	private async execute(units: UnitSource[]): Promise<ExecutionResult | null> {
		try {
			return await compileAndRun(units, {
				onOutput: (text) => {
					process.stdout.write(text)
				},
			})
		} catch (error: unknown) {
			return this.fail(formatCompileError(error))
		}
	}

	override async run(): Promise<void> {
		const sources = await this.readSources()
		if (sources === null) return

		const result = await this.execute(sources)
		if (result === null) return

		if (result.uncaught !== null) {
			this.fail(formatUncaught(result.uncaught))
		}
		if (result.leaks.length > 0) {
			this.logger.warning(formatLeaks(result.leaks.length))
			if (this.leaks) for (const leak of result.leaks) this.logger.info(leak)
		}
	}
}
