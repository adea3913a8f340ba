/**
 * Formatting pipeline.
 *
 * Chains the phases for one file:
 * 1. Parsing (source → outline syntax tree)
 * 2. Extraction (tree → code sections and inherited expansions)
 * 3. Section transformers (sections → replacements)
 * 4. Text pass (replacements and the gaps between them → spacing fixes)
 * 5. Merge (replacements → formatted text)
 */

import { FormatContext } from './core/context.ts'
import { FormatError } from './core/errors.ts'
import { type CodeSection, SectionKind } from './core/sections.ts'
import { extractCodeSections } from './extract/extractor.ts'
import { collectInheritedExpansions } from './extract/inherited.ts'
import type { FormatOptions } from './options/options.ts'
import {
	assertNoOverlap,
	computeSourceSections,
	dropNoOps,
	mergeReplacements,
	resolveReplacements,
} from './replacements/merge.ts'
import { sortReplacements, type TextReplacement, unresolved } from './replacements/replacement.ts'
import { parse } from './syntax/parser.ts'
import { applyTextChanges } from './text/scanner.ts'
import { transformInheritedCalls } from './transform/inherited-calls.ts'
import { transformProcedureSection } from './transform/procedure-section.ts'
import { transformSingleKeywordSection } from './transform/single-keyword-section.ts'
import { transformUnitProgramSection } from './transform/unit-program-section.ts'
import { layoutUsesSection } from './transform/uses-section.ts'

export interface FormatResult {
	readonly text: string
	readonly replacements: readonly TextReplacement[]
}

function transformSection(
	section: CodeSection,
	options: FormatOptions,
	source: string,
	context: FormatContext
): TextReplacement | null {
	const enabled = options.transformations
	switch (section.keyword.kind) {
		// Kept even when unchanged: a laid out clause is final and the text pass leaves it alone.
		case SectionKind.Uses:
			return enabled.usesSection ? layoutUsesSection(section, options, source, context) : null
		case SectionKind.Unit:
		case SectionKind.Program:
			return enabled.unitProgramSection ? transformUnitProgramSection(section, options, source) : null
		case SectionKind.Interface:
		case SectionKind.Implementation:
		case SectionKind.Initialization:
		case SectionKind.Finalization:
			return enabled.singleKeywordSections
				? transformSingleKeywordSection(section, options, source)
				: null
		case SectionKind.ProcedureDeclaration:
		case SectionKind.FunctionDeclaration:
			return enabled.procedureSection ? transformProcedureSection(section) : null
		default:
			return null
	}
}

/**
 * Compute the replacements that format `source`.
 *
 * The result is sorted by start offset, free of overlaps and free of
 * replacements that would leave the text unchanged.
 *
 * @throws {FormatError} If the source cannot be parsed
 */
export function produceReplacements(
	source: string,
	options: FormatOptions,
	context: FormatContext = new FormatContext(source)
): TextReplacement[] {
	// Phase 1: Parsing
	const parseResult = parse(source)
	if (!parseResult.succeeded || parseResult.tree === undefined) {
		context.emitAtOffset('PFPARSE001', 0, { reason: parseResult.message ?? 'unexpected input' })
		const diagnostic = context.getDiagnostics().at(-1)
		throw new FormatError(
			diagnostic === undefined ? 'cannot parse source' : context.formatDiagnostic(diagnostic),
			diagnostic
		)
	}
	const { root } = parseResult.tree

	// Phase 2 and 3: sections and their transformers
	const replacements: TextReplacement[] = []
	for (const section of extractCodeSections(root)) {
		const replacement = transformSection(section, options, source, context)
		if (replacement !== null) replacements.push(replacement)
	}

	if (options.transformations.inheritedCalls) {
		replacements.push(...transformInheritedCalls(collectInheritedExpansions(root, source)))
	}

	let sorted = sortReplacements(replacements)
	assertNoOverlap(sorted)

	// Phase 4: text pass over replacements and gaps
	if (options.transformations.textTransformations) {
		const gaps = computeSourceSections(source, sorted).map((gap) => unresolved(gap.start, gap.end))
		sorted = resolveReplacements(source, [...sorted, ...gaps], (text, around) =>
			applyTextChanges(text, options.textChanges, around)
		)
	}

	return dropNoOps(source, sorted)
}

/**
 * Format `source` and return the new text with the replacements that produced it.
 *
 * @throws {FormatError} If the source cannot be parsed
 */
export function formatSource(
	source: string,
	options: FormatOptions,
	context: FormatContext = new FormatContext(source)
): FormatResult {
	const replacements = produceReplacements(source, options, context)
	return {
		replacements,
		text: mergeReplacements(source, replacements),
	}
}
