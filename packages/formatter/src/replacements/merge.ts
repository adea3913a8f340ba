/**
 * Replacement merge engine: gap computation, refinement passes and the final splice.
 */

import { interpolateMessage, PFFMT002 } from '../core/diagnostics.ts'
import { FormatError } from '../core/errors.ts'
import {
	isNoOp,
	literal,
	resolvedText,
	type SourceSection,
	sortReplacements,
	type TextReplacement,
} from './replacement.ts'

function describeRange(replacement: TextReplacement): string {
	return `${replacement.start}-${replacement.end}`
}

/**
 * Throws when two replacements claim overlapping ranges.
 * Expects `sorted` to be ordered by start.
 */
export function assertNoOverlap(sorted: readonly TextReplacement[]): void {
	for (let i = 1; i < sorted.length; i++) {
		const previous = sorted[i - 1]
		const current = sorted[i]
		if (previous === undefined || current === undefined) continue
		if (previous.end > current.start) {
			const message = interpolateMessage(PFFMT002.message, {
				first: describeRange(previous),
				second: describeRange(current),
			})
			throw new FormatError(`[${PFFMT002.code}] ${message}`)
		}
	}
}

/**
 * Ranges of `source` not covered by any replacement, in order.
 */
export function computeSourceSections(
	source: string,
	replacements: readonly TextReplacement[]
): SourceSection[] {
	const sections: SourceSection[] = []
	let position = 0

	for (const replacement of sortReplacements(replacements)) {
		if (replacement.start > position) {
			sections.push({ end: replacement.start, start: position })
		}
		position = Math.max(position, replacement.end)
	}

	if (position < source.length) {
		sections.push({ end: source.length, start: position })
	}

	return sections
}

/**
 * Splice all replacements into `source`.
 * Unresolved replacements contribute their original slice.
 *
 * @throws {FormatError} If two replacements overlap
 */
export function mergeReplacements(source: string, replacements: readonly TextReplacement[]): string {
	const sorted = sortReplacements(replacements)
	assertNoOverlap(sorted)

	const parts: string[] = []
	let position = 0
	for (const replacement of sorted) {
		parts.push(source.slice(position, replacement.start), resolvedText(source, replacement))
		position = replacement.end
	}
	parts.push(source.slice(position))

	return parts.join('')
}

/** Text on either side of a piece handed to a text transform. */
export interface TextContext {
	readonly before: string
	readonly after: string
}

export type TextTransform = (text: string, context: TextContext) => string

const CONTEXT_LENGTH = 256

function hasVisibleChar(text: string): boolean {
	return /[^ \t]/.test(text)
}

/**
 * Text that follows replacement `index`, up to and including the first
 * character that is not a space or tab.
 */
function followingText(
	source: string,
	replacements: readonly TextReplacement[],
	index: number
): string {
	let position = replacements[index]?.end ?? source.length
	let text = ''
	for (let i = index + 1; i < replacements.length; i++) {
		const next = replacements[i]
		if (next === undefined) break
		text += source.slice(position, next.start) + resolvedText(source, next)
		position = next.end
		if (hasVisibleChar(text)) return text
	}
	return text + source.slice(position, position + CONTEXT_LENGTH)
}

/**
 * Run a text transform over every replacement that is not final, in order.
 *
 * Each piece sees the output produced so far and the text that follows it.
 * Literal replacements take the transformed text when it differs. Unresolved
 * ones are transformed from their original slice and become literal only if
 * the result differs from that slice.
 */
export function resolveReplacements(
	source: string,
	replacements: readonly TextReplacement[],
	transform: TextTransform
): TextReplacement[] {
	const sorted = sortReplacements(replacements)
	const resolved: TextReplacement[] = []
	let before = ''
	let position = 0

	sorted.forEach((replacement, index) => {
		before = (before + source.slice(position, replacement.start)).slice(-CONTEXT_LENGTH)
		let result = replacement
		if (!replacement.final) {
			const original = resolvedText(source, replacement)
			const text = transform(original, { after: followingText(source, sorted, index), before })
			if (text !== original) result = literal(replacement.start, replacement.end, text)
		}
		resolved.push(result)
		before = (before + resolvedText(source, result)).slice(-CONTEXT_LENGTH)
		position = Math.max(position, replacement.end)
	})

	return resolved
}

/**
 * Filter out the identity placeholders.
 */
export function dropUnresolved(replacements: readonly TextReplacement[]): TextReplacement[] {
	return replacements.filter((r) => r.text.kind === 'literal')
}

/**
 * Drop placeholders and replacements that would not change the text.
 */
export function dropNoOps(source: string, replacements: readonly TextReplacement[]): TextReplacement[] {
	return dropUnresolved(replacements).filter((r) => !isNoOp(source, r))
}
