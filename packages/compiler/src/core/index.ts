/**
 * Shared compiler infrastructure: syntax tree, compilation context,
 * diagnostics and error classes.
 */

export type * from './ast.ts'
export { collectRequires, isDeclaration } from './ast.ts'
export {
	CompilationContext,
	type ContextOptions,
	DEFAULT_MAX_ERRORS,
	type Diagnostic,
} from './context.ts'
export {
	COMPILER_DIAGNOSTICS,
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticKind,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
	isValidDiagnosticCode,
} from './diagnostics.ts'
export { CompileCancelledError, CompileError, InternalCompilerError, invariant } from './errors.ts'
export { createLocator, type SourceLocation } from './location.ts'
