/**
 * CLI diagnostic definitions.
 *
 * Error code format: PFCLI<NUMBER>
 * - PFCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (PFCLI001-099)
// =============================================================================

export const PFCLI001: DiagnosticDef = {
	code: 'PFCLI001',
	description: "pasfix couldn't find a file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const PFCLI002: DiagnosticDef = {
	code: 'PFCLI002',
	description: "The file exists but pasfix can't open it.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const PFCLI003: DiagnosticDef = {
	code: 'PFCLI003',
	description: "pasfix couldn't save the formatted file.",
	message: 'cannot write file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have write permission for this file.',
}

export const PFCLI004: DiagnosticDef = {
	code: 'PFCLI004',
	description: 'The pattern given with --multi did not match any file.',
	message: 'no files match "{pattern}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Quote the pattern so your shell does not expand it, e.g. "src/**/*.pas".',
}

export const PFCLI005: DiagnosticDef = {
	code: 'PFCLI005',
	description: 'Something unexpected went wrong while formatting.',
	message: 'formatting failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check your source file, or report this if it seems like a bug.',
}

export const PFCLI006: DiagnosticDef = {
	code: 'PFCLI006',
	description: 'init-config never overwrites an existing configuration file.',
	message: 'config file already exists: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Delete the file first or pass a different path.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	PFCLI001,
	PFCLI002,
	PFCLI003,
	PFCLI004,
	PFCLI005,
	PFCLI006,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
