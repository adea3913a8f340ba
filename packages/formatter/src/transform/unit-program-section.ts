import { type CodeSection, nodeText, SectionKind } from '../core/sections.ts'
import type { FormatOptions } from '../options/options.ts'
import type { TextReplacement } from '../replacements/replacement.ts'
import { adjustReplacementForLinePosition, createReplacementIfDifferent } from './line-position.ts'

/**
 * Normalize `unit Name;` and `program Name;` headers.
 * Only the exact shape keyword, name, semicolon is rewritten.
 */
export function transformUnitProgramSection(
	section: CodeSection,
	options: FormatOptions,
	source: string
): TextReplacement | null {
	const [name, terminator] = section.siblings
	if (
		section.siblings.length !== 2 ||
		name?.kind !== SectionKind.Module ||
		terminator?.kind !== SectionKind.Semicolon
	) {
		return null
	}

	const keyword = section.keyword.kind === SectionKind.Program ? 'program' : 'unit'
	const text = `${keyword} ${nodeText(source, name)};`

	const replacement = adjustReplacementForLinePosition(
		source,
		section.keyword.span.start,
		terminator.span.end,
		text,
		options.lineEnding
	)
	return createReplacementIfDifferent(source, replacement)
}
