/**
 * Rendering catalog entries as text.
 */

import type { DiagnosticArgs, DiagnosticDef } from './types.ts'

const PLACEHOLDER = /\{(\w+)\}/g

/**
 * Fill `{name}` placeholders from `args`; a placeholder without an argument
 * is kept as written.
 */
export function interpolateMessage(template: string, args: DiagnosticArgs = {}): string {
	return template.replace(PLACEHOLDER, (placeholder: string, name: string) => {
		const value = args[name]
		return value === undefined ? placeholder : String(value)
	})
}

/**
 * Render a catalog entry as a single `[CODE] message` line.
 */
export function formatDiagnosticLine(def: DiagnosticDef, args?: DiagnosticArgs): string {
	return `[${def.code}] ${interpolateMessage(def.message, args)}`
}
