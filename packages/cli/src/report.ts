/**
 * Diff-style rendering of replacements for `check`.
 */

import { LineIndex, resolvedText, type TextReplacement } from '@pasfix/formatter'

/**
 * Split into lines the way a reader sees them: no empty entry after a
 * trailing line break, no entries at all for empty text.
 */
export function splitLines(text: string): string[] {
	if (text === '') return []
	const lines = text.split(/\r\n|\r|\n/)
	if (lines.at(-1) === '') lines.pop()
	return lines
}

/**
 * One block per replacement:
 *
 * ```
 * Replacement 1: Location 1:1-1:11
 * - uses B, A;
 * + uses
 * +   A,
 * +   B;
 * ```
 *
 * Locations are 1-based `line:column`.
 */
export function formatReplacementReport(source: string, replacements: readonly TextReplacement[]): string {
	const lines = new LineIndex(source)
	const blocks = replacements.map((replacement, index) => {
		const from = lines.positionAt(replacement.start)
		const to = lines.positionAt(replacement.end)
		const location = `${from.row + 1}:${from.column + 1}-${to.row + 1}:${to.column + 1}`
		const original = splitLines(source.slice(replacement.start, replacement.end)).map((line) => `- ${line}`)
		const updated = splitLines(resolvedText(source, replacement)).map((line) => `+ ${line}`)
		return [`Replacement ${index + 1}: Location ${location}`, ...original, ...updated].join('\n')
	})
	return blocks.join('\n\n')
}
