/**
 * @pasfix/diagnostics
 *
 * Shared diagnostic types and definitions for pasfix packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	PFCLI001,
	PFCLI002,
	PFCLI003,
	PFCLI004,
	PFCLI005,
	PFCLI006,
} from './cli.ts'
export {
	FORMATTER_DIAGNOSTICS,
	type FormatterDiagnosticCode,
	PFCFG001,
	PFCFG002,
	PFCFG003,
	PFFMT001,
	PFFMT002,
	PFPARSE001,
} from './formatter.ts'
export { formatDiagnosticLine, interpolateMessage } from './message.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	type DiagnosticSeverity as DiagnosticSeverityType,
	SEVERITY_LABELS,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { FORMATTER_DIAGNOSTICS } from './formatter.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...FORMATTER_DIAGNOSTICS,
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
