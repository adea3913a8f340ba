/**
 * Parser entry point: source text to syntax tree.
 */

import { match, type RawNode, semantics } from './grammar.ts'
import { buildTree, type SyntaxTree } from './tree.ts'

/**
 * Result of parsing a source file.
 */
export interface ParseResult {
	readonly succeeded: boolean
	readonly tree?: SyntaxTree
	readonly message?: string
}

/**
 * Parse Pascal source into an outline syntax tree.
 *
 * Malformed constructs become error nodes inside a successful result; the
 * match itself only fails on input the grammar cannot consume at all.
 */
export function parse(source: string): ParseResult {
	const matchResult = match(source)

	if (matchResult.failed()) {
		return {
			message: matchResult.shortMessage ?? 'unexpected input',
			succeeded: false,
		}
	}

	const nodes: RawNode[] = semantics(matchResult)['toRawNodes']()

	return {
		succeeded: true,
		tree: buildTree(source, nodes),
	}
}
