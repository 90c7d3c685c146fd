export {
	type CompiledUnit,
	compile,
	loadPrelude,
	PRELUDE_UNIT,
	type ParsedUnit,
	parseUnit,
	type UnitSource,
	verifyModule,
} from './compile.ts'
export {
	type CompileOptions,
	DEFAULT_RUNTIME_CONFIG,
	DEFAULT_TARGET,
	type Optimizer,
	type ResolvedOptions,
	type RuntimeConfig,
	resolveOptions,
} from './options.ts'
export { compileAndRun, compileUnits, type RunOptions } from './units.ts'
