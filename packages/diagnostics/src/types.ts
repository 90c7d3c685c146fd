/**
 * Diagnostic severity levels.
 */
export const DiagnosticSeverity = {
	Error: 0,
	Note: 2,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/**
 * Error families reported to callers alongside the code.
 */
export const DiagnosticKind = {
	DependencyError: 'DependencyError',
	DuplicateSymbolError: 'DuplicateSymbolError',
	InvalidControlFlowError: 'InvalidControlFlowError',
	ParseError: 'ParseError',
	RuntimeError: 'RuntimeError',
	TypeMismatchError: 'TypeMismatchError',
	UnresolvedSymbolError: 'UnresolvedSymbolError',
	UnsupportedConstructError: 'UnsupportedConstructError',
	UseBeforeDefError: 'UseBeforeDefError',
	VisibilityViolationError: 'VisibilityViolationError',
	Warning: 'Warning',
} as const

export type DiagnosticKind = (typeof DiagnosticKind)[keyof typeof DiagnosticKind]

/**
 * Diagnostic definition in the catalog.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly kind: DiagnosticKind
	readonly severity: DiagnosticSeverity
	readonly message: string
	readonly description: string
	readonly suggestion?: string
}

/**
 * Template arguments for diagnostic messages.
 */
export type DiagnosticArgs = Readonly<Record<string, string | number | bigint>>
