/**
 * Formatter diagnostic definitions.
 *
 * Error code format: PF<PHASE><NUMBER>
 * - PFPARSE: Parser errors (001-099)
 * - PFFMT: Formatting warnings and errors (001-099)
 * - PFCFG: Configuration warnings (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// PARSER ERRORS (PFPARSE001-099)
// =============================================================================

export const PFPARSE001: DiagnosticDef = {
	code: 'PFPARSE001',
	description: "pasfix couldn't build a syntax tree for this file, so nothing was changed.",
	message: 'cannot parse source: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that the file is a Pascal source and that it is not truncated.',
}

// =============================================================================
// FORMATTING (PFFMT001-099)
// =============================================================================

export const PFFMT001: DiagnosticDef = {
	code: 'PFFMT001',
	description:
		'The uses clause contains a comment or compiler directive. Sorting the units could move it to the wrong place, so the clause was left as it is.',
	message: 'uses clause skipped: contains a {what}',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Move the {what} out of the uses clause if you want it formatted.',
}

export const PFFMT002: DiagnosticDef = {
	code: 'PFFMT002',
	description: 'Two edits claimed the same part of the file. This is a bug in pasfix.',
	message: 'overlapping replacements at {first} and {second}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Please report this together with the file that triggered it.',
}

// =============================================================================
// CONFIGURATION (PFCFG001-099)
// =============================================================================

export const PFCFG001: DiagnosticDef = {
	code: 'PFCFG001',
	description: "The configuration file couldn't be read or isn't valid TOML. Defaults are used instead.",
	message: 'ignoring config {path}: {reason}',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Run `pasfix init-config` to see a valid configuration file.',
}

export const PFCFG002: DiagnosticDef = {
	code: 'PFCFG002',
	description: 'A configuration value has the wrong type or an unknown value. Its default is used.',
	message: 'invalid value for "{key}": expected {expected}',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Fix or remove "{key}" in your configuration file.',
}

export const PFCFG003: DiagnosticDef = {
	code: 'PFCFG003',
	description: "A file pattern in the configuration couldn't be used.",
	message: 'ignoring invalid pattern "{pattern}"',
	severity: DiagnosticSeverity.Warning,
}

// =============================================================================
// CATALOG
// =============================================================================

export const FORMATTER_DIAGNOSTICS = {
	PFCFG001,
	PFCFG002,
	PFCFG003,
	PFFMT001,
	PFFMT002,
	PFPARSE001,
} as const

export type FormatterDiagnosticCode = keyof typeof FORMATTER_DIAGNOSTICS
