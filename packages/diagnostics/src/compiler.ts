/**
 * Compiler diagnostic definitions.
 *
 * Error code format: KL<PHASE><NUMBER>
 * - KLPARSE: Front-end errors (001-099)
 * - KLRES: Resolver errors (001-049), warnings (050-099)
 * - KLCFG: Control-flow normalizer warnings (050-099)
 * - KLSSA: SSA construction errors (001-099)
 * - KLUNIT: Unit scheduling errors (001-099)
 */

import { type DiagnosticDef, DiagnosticKind, DiagnosticSeverity } from './types.ts'

// =============================================================================
// FRONT-END ERRORS (KLPARSE001-099)
// =============================================================================

export const KLPARSE001: DiagnosticDef = {
	code: 'KLPARSE001',
	description: "The parser couldn't make sense of this part of the file.",
	kind: DiagnosticKind.ParseError,
	message: 'syntax error: {detail}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check for a missing `;`, brace or parenthesis near this position.',
}

export const KLPARSE002: DiagnosticDef = {
	code: 'KLPARSE002',
	description: 'Only variables, properties and array elements can be assigned to.',
	kind: DiagnosticKind.ParseError,
	message: 'cannot assign to {target}',
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// RESOLVER ERRORS (KLRES001-049)
// =============================================================================

export const KLRES001: DiagnosticDef = {
	code: 'KLRES001',
	description: 'This name does not refer to anything declared in this file or its dependencies.',
	kind: DiagnosticKind.UnresolvedSymbolError,
	message: 'unresolved {what} `{name}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare `{name}` or add the unit that declares it as a dependency.',
}

export const KLRES002: DiagnosticDef = {
	code: 'KLRES002',
	description: 'The value has a type that does not fit where it is used.',
	kind: DiagnosticKind.TypeMismatchError,
	message: 'type mismatch in {context}: expected {expected}, found {found}',
	severity: DiagnosticSeverity.Error,
}

export const KLRES003: DiagnosticDef = {
	code: 'KLRES003',
	description:
		'An overriding method must accept at least what the parent accepts and return something the parent could return.',
	kind: DiagnosticKind.TypeMismatchError,
	message: '`{method}` is not compatible with `{parent}`: {reason}',
	severity: DiagnosticSeverity.Error,
}

export const KLRES004: DiagnosticDef = {
	code: 'KLRES004',
	description: 'Private members are visible only inside their class, protected ones inside its hierarchy.',
	kind: DiagnosticKind.VisibilityViolationError,
	message: 'cannot access {visibility} {what} `{name}` from {scope}',
	severity: DiagnosticSeverity.Error,
}

export const KLRES005: DiagnosticDef = {
	code: 'KLRES005',
	description: 'An override cannot be less visible than the method it replaces.',
	kind: DiagnosticKind.VisibilityViolationError,
	message: '`{method}` must be {visibility} (as in `{parent}`) or weaker',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare `{method}` as {visibility}.',
}

export const KLRES006: DiagnosticDef = {
	code: 'KLRES006',
	description: 'This feature needs runtime evaluation that compiled programs do not support.',
	kind: DiagnosticKind.UnsupportedConstructError,
	message: 'unsupported construct: {construct}',
	severity: DiagnosticSeverity.Error,
}

export const KLRES007: DiagnosticDef = {
	code: 'KLRES007',
	description: 'Each function, class, method, property and constant can be declared once.',
	kind: DiagnosticKind.DuplicateSymbolError,
	message: '{what} `{name}` is already declared',
	severity: DiagnosticSeverity.Error,
}

export const KLRES008: DiagnosticDef = {
	code: 'KLRES008',
	description: '`break` and `continue` need an enclosing loop or switch at the requested depth.',
	kind: DiagnosticKind.InvalidControlFlowError,
	message: '`{keyword} {depth}` has no enclosing loop or switch at that depth',
	severity: DiagnosticSeverity.Error,
}

export const KLRES009: DiagnosticDef = {
	code: 'KLRES009',
	description: 'A concrete class must implement every method its interfaces and abstract parents declare.',
	kind: DiagnosticKind.TypeMismatchError,
	message: 'class `{class}` does not implement `{method}`',
	severity: DiagnosticSeverity.Error,
}

export const KLRES010: DiagnosticDef = {
	code: 'KLRES010',
	description: 'Interfaces and abstract classes have no instances of their own.',
	kind: DiagnosticKind.TypeMismatchError,
	message: 'cannot instantiate {what} `{name}`',
	severity: DiagnosticSeverity.Error,
}

export const KLRES011: DiagnosticDef = {
	code: 'KLRES011',
	description: 'The call passes a different number of arguments than the callee declares.',
	kind: DiagnosticKind.TypeMismatchError,
	message: '`{name}` expects {expected} argument(s), found {found}',
	severity: DiagnosticSeverity.Error,
}

export const KLRES012: DiagnosticDef = {
	code: 'KLRES012',
	description: 'Final classes cannot be extended and final methods cannot be overridden.',
	kind: DiagnosticKind.TypeMismatchError,
	message: 'cannot {action} final {what} `{name}`',
	severity: DiagnosticSeverity.Error,
}

export const KLRES013: DiagnosticDef = {
	code: 'KLRES013',
	description: 'This operation is not defined for values of this type.',
	kind: DiagnosticKind.TypeMismatchError,
	message: '{operation} cannot be applied to {type}',
	severity: DiagnosticSeverity.Error,
}

export const KLRES014: DiagnosticDef = {
	code: 'KLRES014',
	description: 'Readonly properties can only be initialized from inside their declaring class.',
	kind: DiagnosticKind.TypeMismatchError,
	message: 'cannot modify readonly property `{name}`',
	severity: DiagnosticSeverity.Error,
}

export const KLRES015: DiagnosticDef = {
	code: 'KLRES015',
	description: 'Defaults, class constants and attribute arguments are evaluated at compile time.',
	kind: DiagnosticKind.TypeMismatchError,
	message: '{what} must be a constant expression',
	severity: DiagnosticSeverity.Error,
}

export const KLRES016: DiagnosticDef = {
	code: 'KLRES016',
	description: 'Classes extend one class and implement interfaces; interfaces extend interfaces.',
	kind: DiagnosticKind.TypeMismatchError,
	message: '`{name}` cannot {relation} `{target}`: {reason}',
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// RESOLVER WARNINGS (KLRES050-099)
// =============================================================================

export const KLRES050: DiagnosticDef = {
	code: 'KLRES050',
	description: 'Attributes other than `ffi` carry no meaning for the compiler.',
	kind: DiagnosticKind.Warning,
	message: 'unknown attribute `{name}` ignored',
	severity: DiagnosticSeverity.Warning,
}

// =============================================================================
// NORMALIZER WARNINGS (KLCFG050-099)
// =============================================================================

export const KLCFG050: DiagnosticDef = {
	code: 'KLCFG050',
	description: 'This code will never run because control always leaves before reaching it.',
	kind: DiagnosticKind.Warning,
	message: 'unreachable code',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Remove it, or move it before the `return`, `throw`, `break` or `continue`.',
}

// =============================================================================
// SSA ERRORS (KLSSA001-099)
// =============================================================================

export const KLSSA001: DiagnosticDef = {
	code: 'KLSSA001',
	description:
		'Compiled programs reject reads of variables that are unassigned on some path instead of reading null.',
	kind: DiagnosticKind.UseBeforeDefError,
	message: 'variable `${name}` may be used before it is assigned',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Assign `${name}` on every path that reaches this use.',
}

// =============================================================================
// UNIT SCHEDULING ERRORS (KLUNIT001-099)
// =============================================================================

export const KLUNIT001: DiagnosticDef = {
	code: 'KLUNIT001',
	description: 'A unit names a dependency that was not handed to the compiler.',
	kind: DiagnosticKind.DependencyError,
	message: 'unit `{unit}` depends on unknown unit `{dependency}`',
	severity: DiagnosticSeverity.Error,
}

export const KLUNIT002: DiagnosticDef = {
	code: 'KLUNIT002',
	description: 'Units must form an acyclic dependency graph so each is resolved after its dependencies.',
	kind: DiagnosticKind.DependencyError,
	message: 'dependency cycle: {cycle}',
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all compiler diagnostics.
 */
export const COMPILER_DIAGNOSTICS = {
	KLCFG050,
	KLPARSE001,
	KLPARSE002,
	KLRES001,
	KLRES002,
	KLRES003,
	KLRES004,
	KLRES005,
	KLRES006,
	KLRES007,
	KLRES008,
	KLRES009,
	KLRES010,
	KLRES011,
	KLRES012,
	KLRES013,
	KLRES014,
	KLRES015,
	KLRES016,
	KLRES050,
	KLSSA001,
	KLUNIT001,
	KLUNIT002,
} as const

export type CompilerDiagnosticCode = keyof typeof COMPILER_DIAGNOSTICS
