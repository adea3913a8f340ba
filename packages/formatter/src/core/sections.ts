/**
 * Tree-independent section records produced by the extractor.
 */

import type { Span } from './span.ts'

/** Section kinds - closed set of tags. */
export const SectionKind = {
	Comment: 'Comment',
	Finalization: 'Finalization',
	FunctionDeclaration: 'FunctionDeclaration',
	Identifier: 'Identifier',
	Implementation: 'Implementation',
	Initialization: 'Initialization',
	Interface: 'Interface',
	Module: 'Module',
	Preprocessor: 'Preprocessor',
	ProcedureDeclaration: 'ProcedureDeclaration',
	Program: 'Program',
	Semicolon: 'Semicolon',
	Unit: 'Unit',
	Uses: 'Uses',
} as const

export type SectionKind = (typeof SectionKind)[keyof typeof SectionKind]

export interface ParsedNode {
	readonly kind: SectionKind
	readonly span: Span
}

/**
 * One recognized construct: the keyword node and the classified nodes up to
 * and including its terminator.
 */
export interface CodeSection {
	readonly keyword: ParsedNode
	readonly siblings: readonly ParsedNode[]
}

/**
 * A bare `inherited;` statement that can be spelled out as an explicit call.
 */
export interface InheritedExpansion {
	/** Offset right after the `inherited` keyword */
	readonly offset: number
	readonly routineName: string
	readonly argumentNames: readonly string[]
}

export function nodeText(source: string, node: ParsedNode): string {
	return source.slice(node.span.start, node.span.end)
}

export function isSingleKeywordKind(kind: SectionKind): boolean {
	return (
		kind === SectionKind.Interface ||
		kind === SectionKind.Implementation ||
		kind === SectionKind.Initialization ||
		kind === SectionKind.Finalization
	)
}
