export const DiagnosticSeverity = {
	Error: 0,
	Note: 2,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/** Label printed in front of a rendered diagnostic, as in `warning[PFFMT001]`. */
export const SEVERITY_LABELS: Readonly<Record<DiagnosticSeverity, string>> = {
	[DiagnosticSeverity.Error]: 'error',
	[DiagnosticSeverity.Note]: 'note',
	[DiagnosticSeverity.Warning]: 'warning',
}

/**
 * A catalog entry. `message` and `suggestion` may contain `{name}`
 * placeholders filled from `DiagnosticArgs`.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly severity: DiagnosticSeverity
	readonly message: string
	/** Longer explanation for documentation */
	readonly description: string
	readonly suggestion?: string
}

export type DiagnosticArgs = Readonly<Record<string, string | number>>
