/**
 * Re-export diagnostic types and formatter definitions from shared package.
 */

import { FORMATTER_DIAGNOSTICS } from '@pasfix/diagnostics'

export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	FORMATTER_DIAGNOSTICS,
	type FormatterDiagnosticCode,
	interpolateMessage,
	PFCFG001,
	PFCFG002,
	PFCFG003,
	PFFMT001,
	PFFMT002,
	PFPARSE001,
	SEVERITY_LABELS,
} from '@pasfix/diagnostics'

/**
 * All valid diagnostic codes for the formatter.
 */
export type DiagnosticCode = keyof typeof FORMATTER_DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof FORMATTER_DIAGNOSTICS)[typeof code] {
	return FORMATTER_DIAGNOSTICS[code]
}
