/**
 * Per-file formatting context.
 * Holds the source, its line index and the diagnostics collected while formatting.
 */

import {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
	SEVERITY_LABELS,
} from './diagnostics.ts'
import { LineIndex } from './span.ts'

export { DiagnosticSeverity } from './diagnostics.ts'

/**
 * A diagnostic message with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** Line number (1-indexed) */
	readonly line: number
	/** Column number (1-indexed) */
	readonly column: number
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
}

export class FormatContext {
	/** Original source code */
	readonly source: string

	/** Source filename for diagnostics */
	readonly filename: string

	readonly lines: LineIndex

	private readonly diagnostics: Diagnostic[] = []

	constructor(source: string, filename = '<input>') {
		this.source = source
		this.filename = filename
		this.lines = new LineIndex(source)
	}

	/**
	 * Emit a diagnostic by code at a 1-indexed line and column.
	 */
	emit(code: DiagnosticCode, line: number, column: number, args?: DiagnosticArgs): void {
		const def = getDiagnostic(code)
		const message = interpolateMessage(def.message, args)
		this.diagnostics.push({
			column,
			def,
			line,
			message,
			...(args ? { args } : {}),
		})
	}

	/**
	 * Emit a diagnostic at a source offset.
	 */
	emitAtOffset(code: DiagnosticCode, offset: number, args?: DiagnosticArgs): void {
		const { row, column } = this.lines.positionAt(offset)
		this.emit(code, row + 1, column + 1, args)
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}

	getWarnings(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Warning)
	}

	getSourceLine(line: number): string | undefined {
		const lines = this.source.split(/\r\n|\r|\n/)
		return lines[line - 1]
	}

	/**
	 * Format a diagnostic for display.
	 *
	 * Example:
	 * ```
	 * warning[PFFMT001]: uses clause skipped: contains a comment
	 *   --> src/Main.pas:3:1
	 *    |
	 *  3 | uses Classes {keep}, SysUtils;
	 *    | ^
	 *    |
	 *    = help: Move the comment out of the uses clause if you want it formatted.
	 * ```
	 */
	formatDiagnostic(diagnostic: Diagnostic): string {
		const { def } = diagnostic
		const header = `${SEVERITY_LABELS[def.severity]}[${def.code}]: ${diagnostic.message}`
		const location = `  --> ${this.filename}:${diagnostic.line}:${diagnostic.column}`

		const sourceLine = this.getSourceLine(diagnostic.line)
		if (sourceLine === undefined) {
			return `${header}\n${location}`
		}

		const pad = ' '.repeat(String(diagnostic.line).length)
		const emptyPrefix = ` ${pad} | `
		const pointer = `${' '.repeat(Math.max(0, diagnostic.column - 1))}^`
		const lines = [
			header,
			location,
			emptyPrefix,
			` ${diagnostic.line} | ${sourceLine}`,
			`${emptyPrefix}${pointer}`,
		]

		if (def.suggestion) {
			lines.push(emptyPrefix, `   = help: ${interpolateMessage(def.suggestion, diagnostic.args)}`)
		}

		return lines.join('\n')
	}
}
