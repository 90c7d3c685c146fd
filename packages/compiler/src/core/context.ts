/**
 * Per-unit compilation context.
 * Holds the source text and the diagnostics every stage reports into.
 */

import {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
} from './diagnostics.ts'
import type { SourceLocation } from './location.ts'

export { DiagnosticSeverity } from './diagnostics.ts'

/**
 * A diagnostic message with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** File the diagnostic belongs to */
	readonly file: string
	/** Line number (1-indexed) */
	readonly line: number
	/** Column number (1-indexed) */
	readonly column: number
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
}

export const DEFAULT_MAX_ERRORS = 25

export interface ContextOptions {
	filename?: string
	/** Errors beyond this count are dropped and the list is marked truncated */
	maxErrors?: number
}

/**
 * The compilation context for one translation unit.
 *
 * Design principles:
 * - Stages never mutate earlier output; only diagnostics accumulate here
 * - Errors are collected, not thrown, up to a bounded count
 */
export class CompilationContext {
	/** Original source code */
	readonly source: string

	/** Source filename for error messages */
	readonly filename: string

	readonly maxErrors: number

	private readonly diagnostics: Diagnostic[] = []

	private errorCount = 0

	private droppedErrors = 0

	constructor(source: string, options: ContextOptions | string = {}) {
		const resolved = typeof options === 'string' ? { filename: options } : options
		this.source = source
		this.filename = resolved.filename ?? '<input>'
		this.maxErrors = resolved.maxErrors ?? DEFAULT_MAX_ERRORS
	}

	// ===========================================================================
	// EMIT
	// ===========================================================================

	/**
	 * Emit a diagnostic by code at a specific line and column.
	 */
	emit(code: DiagnosticCode, line: number, column: number, args?: DiagnosticArgs): void {
		const def = getDiagnostic(code)
		const message = interpolateMessage(def.message, args)
		this.addDiagnosticInternal({
			column,
			def,
			file: this.filename,
			line,
			message,
			...(args ? { args } : {}),
		})
	}

	/**
	 * Emit a diagnostic by code at a syntax tree location.
	 */
	emitAt(code: DiagnosticCode, loc: SourceLocation, args?: DiagnosticArgs): void {
		this.emit(code, loc.line, loc.column, args)
	}

	// ===========================================================================
	// INTERNAL
	// ===========================================================================

	private addDiagnosticInternal(diagnostic: Diagnostic): void {
		if (diagnostic.def.severity === DiagnosticSeverity.Error) {
			if (this.errorCount >= this.maxErrors) {
				this.droppedErrors++
				return
			}
			this.errorCount++
		}
		this.diagnostics.push(diagnostic)
	}

	// ===========================================================================
	// QUERY METHODS
	// ===========================================================================

	hasErrors(): boolean {
		return this.errorCount > 0
	}

	getErrorCount(): number {
		return this.errorCount
	}

	/** Number of errors dropped after `maxErrors` was reached */
	getDroppedErrorCount(): number {
		return this.droppedErrors
	}

	isTruncated(): boolean {
		return this.droppedErrors > 0
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}

	getErrors(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Error)
	}

	getWarnings(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Warning)
	}

	getSourceLine(line: number): string | undefined {
		const lines = this.source.split('\n')
		return lines[line - 1]
	}

	// ===========================================================================
	// FORMATTING
	// ===========================================================================

	private getSeverityLabel(severity: DiagnosticSeverity): string {
		const labels: Record<DiagnosticSeverity, string> = {
			[DiagnosticSeverity.Error]: 'error',
			[DiagnosticSeverity.Warning]: 'warning',
			[DiagnosticSeverity.Note]: 'note',
		}
		return labels[severity]
	}

	private buildSourceContext(
		diagnostic: Diagnostic,
		sourceLine: string
	): { emptyPrefix: string; lines: string[] } {
		const lineNumWidth = String(diagnostic.line).length
		const pad = ' '.repeat(lineNumWidth)
		const linePrefix = ` ${diagnostic.line} | `
		const emptyPrefix = ` ${pad} | `
		const pointer = `${' '.repeat(diagnostic.column - 1)}^`

		return {
			emptyPrefix,
			lines: [emptyPrefix, `${linePrefix}${sourceLine}`, `${emptyPrefix}${pointer}`],
		}
	}

	/**
	 * Format a diagnostic for display with its source line.
	 *
	 * Example:
	 * ```
	 * error[KLRES001]: unresolved function `undefined_fn`
	 *   --> src/main.php:4:2
	 *    |
	 *  4 | undefined_fn();
	 *    | ^
	 *    |
	 *    = help: Declare `undefined_fn` or add the unit that declares it as a dependency.
	 * ```
	 */
	formatDiagnostic(diagnostic: Diagnostic): string {
		const { def } = diagnostic
		const severityLabel = this.getSeverityLabel(def.severity)
		const header = `${severityLabel}[${def.code}]: ${diagnostic.message}`
		const location = `  --> ${diagnostic.file}:${diagnostic.line}:${diagnostic.column}`

		const sourceLine = diagnostic.file === this.filename ? this.getSourceLine(diagnostic.line) : undefined
		if (sourceLine === undefined) {
			return `${header}\n${location}`
		}

		const { emptyPrefix, lines: contextLines } = this.buildSourceContext(diagnostic, sourceLine)
		const lines = [header, location, ...contextLines]

		if (def.suggestion) {
			const suggestion = interpolateMessage(def.suggestion, diagnostic.args)
			lines.push(emptyPrefix, `   = help: ${suggestion}`)
		}

		return lines.join('\n')
	}

	formatAllDiagnostics(): string {
		const formatted = this.diagnostics.map((d) => this.formatDiagnostic(d))
		if (this.droppedErrors > 0) {
			formatted.push(`note: ${this.droppedErrors} more error(s) not shown`)
		}
		return formatted.join('\n\n')
	}
}
