/**
 * Symbol & type resolution.
 *
 * Binds every name of a parsed unit to a declaration, infers local
 * types and produces the typed tree the control-flow normalizer reads.
 */

export { BUILTIN_CONSTANTS, BUILTIN_FUNCTIONS } from './builtins.ts'
export { check } from './checker.ts'
export { MAX_ROUNDS } from './inference.ts'
export { serializeSymbolTable } from './serialize.ts'
export { THROWABLE } from './statements.ts'
export {
	type ClassSymbol,
	type ForeignBinding,
	type FunctionSymbol,
	mangleMethod,
	type MethodSymbol,
	type PropertySymbol,
	SymbolTable,
} from './symbols.ts'
export type * from './typed.ts'
export { unitMainName, unitNameOf } from './typed.ts'
export {
	ANY_ARRAY,
	type ArrayType,
	arrayOf,
	BOOL,
	FLOAT,
	INT,
	isRefCounted,
	MIXED,
	NULL,
	type ObjectType,
	objectOf,
	type PhpType,
	sameType,
	STRING,
	typeToString,
	VOID,
} from './types.ts'
export { type ConstValue, formatConst, formatFloat } from './values.ts'
