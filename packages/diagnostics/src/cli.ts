/**
 * CLI diagnostic definitions.
 *
 * Error code format: KLCLI<NUMBER>
 * - KLCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticKind, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (KLCLI001-099)
// =============================================================================

export const KLCLI001: DiagnosticDef = {
	code: 'KLCLI001',
	description: 'There is no file at this path.',
	kind: DiagnosticKind.DependencyError,
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const KLCLI002: DiagnosticDef = {
	code: 'KLCLI002',
	description: 'The file exists but cannot be opened.',
	kind: DiagnosticKind.DependencyError,
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const KLCLI003: DiagnosticDef = {
	code: 'KLCLI003',
	description: 'The output file could not be saved.',
	kind: DiagnosticKind.DependencyError,
	message: 'cannot write file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have write permission for the output directory.',
}

export const KLCLI004: DiagnosticDef = {
	code: 'KLCLI004',
	description: 'This output format is not one of the printable stages.',
	kind: DiagnosticKind.DependencyError,
	message: 'unknown target "{target}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use `--target ir`, `--target ssa` or `--target cfg`.',
}

export const KLCLI005: DiagnosticDef = {
	code: 'KLCLI005',
	description: 'Something unexpected went wrong during compilation.',
	kind: DiagnosticKind.DependencyError,
	message: 'compilation failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check your source file, or report this if it seems like a bug.',
}

export const KLCLI006: DiagnosticDef = {
	code: 'KLCLI006',
	description: 'The program raised an exception that no catch block handled.',
	kind: DiagnosticKind.RuntimeError,
	message: 'uncaught {className}: {message}',
	severity: DiagnosticSeverity.Error,
}

export const KLCLI007: DiagnosticDef = {
	code: 'KLCLI007',
	description: 'Reference-counted values were still alive when the program finished.',
	kind: DiagnosticKind.RuntimeError,
	message: 'program finished with {count} live heap cell(s)',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Reference cycles are not collected; break the cycle before the last use.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	KLCLI001,
	KLCLI002,
	KLCLI003,
	KLCLI004,
	KLCLI005,
	KLCLI006,
	KLCLI007,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
