export type { ArrayKey, Cell, Payload, RtValue } from './heap.ts'
export { Heap, RuntimeFault } from './heap.ts'
export {
	type ExecuteOptions,
	type ExecutionResult,
	execute,
	type ForeignFunction,
	PhpThrow,
	type UncaughtException,
} from './interpreter.ts'
export { BuiltinClass, type Host, numberFormat, RUNTIME_LIBRARY, roundHalfAway } from './library.ts'
