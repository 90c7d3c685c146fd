/**
 * @keel/diagnostics
 *
 * Shared diagnostic types and definitions for the keel packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	KLCLI001,
	KLCLI002,
	KLCLI003,
	KLCLI004,
	KLCLI005,
	KLCLI006,
	KLCLI007,
} from './cli.ts'
export {
	COMPILER_DIAGNOSTICS,
	type CompilerDiagnosticCode,
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
} from './compiler.ts'
export { interpolateMessage } from './interpolate.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticKind,
	DiagnosticSeverity,
	type DiagnosticSeverity as DiagnosticSeverityType,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { COMPILER_DIAGNOSTICS } from './compiler.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...COMPILER_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}
