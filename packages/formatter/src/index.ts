/**
 * pasfix formatter public API
 *
 * Section-aware formatting for Delphi and Object Pascal:
 * - A tolerant outline parser delimits the sections worth rewriting
 * - Per-section transformers produce non-overlapping replacements
 * - A token-aware scanner normalizes spacing in everything else
 */

export {
	type Diagnostic,
	DiagnosticSeverity,
	FormatContext,
} from './core/context.ts'
export { FormatError } from './core/errors.ts'
export {
	type CodeSection,
	type InheritedExpansion,
	type ParsedNode,
	SectionKind,
} from './core/sections.ts'
export { LineIndex, type Point, type Span } from './core/span.ts'
export { extractCodeSections } from './extract/extractor.ts'
export { collectInheritedExpansions } from './extract/inherited.ts'
export {
	createDefaultOptions,
	createOptions,
	DEFAULT_SPACING,
	type FormatOptions,
	getDefaultModuleRenames,
	type OptionsOverrides,
	SpaceOperation,
	type SpacingTable,
	type TextChangeOptions,
	type TransformationOptions,
	type UsesSectionOptions,
	UsesSectionStyle,
} from './options/options.ts'
export { type FormatResult, formatSource, produceReplacements } from './pipeline.ts'
export {
	computeSourceSections,
	dropUnresolved,
	mergeReplacements,
	resolveReplacements,
	type TextContext,
	type TextTransform,
} from './replacements/merge.ts'
export {
	literal,
	type ReplacementText,
	resolvedText,
	type SourceSection,
	type TextReplacement,
	unresolved,
} from './replacements/replacement.ts'
export { type ParseResult, parse } from './syntax/parser.ts'
export { findFirst, printTree, type SyntaxNode, type SyntaxTree } from './syntax/tree.ts'
export { OperatorClass } from './text/operators.ts'
export { applyTextChanges, type ScanContext } from './text/scanner.ts'
