import { type CodeSection, nodeText } from '../core/sections.ts'
import type { FormatOptions } from '../options/options.ts'
import type { TextReplacement } from '../replacements/replacement.ts'
import { adjustReplacementForLinePosition, createReplacementIfDifferent } from './line-position.ts'

/**
 * Lowercase `interface`, `implementation`, `initialization` and `finalization`.
 */
export function transformSingleKeywordSection(
	section: CodeSection,
	options: FormatOptions,
	source: string
): TextReplacement | null {
	const original = nodeText(source, section.keyword)
	const lower = original.toLowerCase()
	if (original === lower) return null

	const replacement = adjustReplacementForLinePosition(
		source,
		section.keyword.span.start,
		section.keyword.span.end,
		lower,
		options.lineEnding
	)
	return createReplacementIfDifferent(source, replacement)
}
