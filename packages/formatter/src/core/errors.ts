import type { Diagnostic } from './context.ts'

/**
 * Raised when a file cannot be formatted at all.
 * Local problems never throw; they only skip the affected section.
 */
export class FormatError extends Error {
	readonly diagnostic: Diagnostic | undefined

	constructor(message: string, diagnostic?: Diagnostic) {
		super(message)
		this.name = 'FormatError'
		this.diagnostic = diagnostic
	}
}
