/**
 * Read-only syntax tree consumed by the section extractor.
 *
 * The extractor only relies on the `SyntaxNode` contract, so the grammar
 * behind it can be replaced without touching the rest of the formatter.
 */

import { LineIndex, type Point } from '../core/span.ts'
import type { RawNode } from './grammar.ts'

export interface SyntaxNode {
	readonly kind: string
	readonly startIndex: number
	readonly endIndex: number
	readonly startPosition: Point
	readonly endPosition: Point
	/** This node itself could not be parsed */
	readonly isError: boolean
	/** This node or one of its descendants could not be parsed */
	readonly hasError: boolean
	readonly parent: SyntaxNode | null
	readonly children: readonly SyntaxNode[]
	readonly text: string
}

export interface SyntaxTree {
	readonly source: string
	readonly root: SyntaxNode
}

class TreeNode implements SyntaxNode {
	readonly kind: string
	readonly startIndex: number
	readonly endIndex: number
	readonly startPosition: Point
	readonly endPosition: Point
	readonly isError: boolean
	readonly hasError: boolean
	readonly children: readonly TreeNode[]
	parent: TreeNode | null = null

	private readonly source: string

	constructor(raw: RawNode, source: string, lines: LineIndex) {
		this.kind = raw.kind
		this.startIndex = raw.start
		this.endIndex = raw.end
		this.startPosition = lines.positionAt(raw.start)
		this.endPosition = lines.positionAt(raw.end)
		this.isError = raw.isError
		this.source = source
		this.children = raw.children.map((child) => new TreeNode(child, source, lines))
		for (const child of this.children) {
			child.parent = this
		}
		this.hasError = this.isError || this.children.some((child) => child.hasError)
	}

	get text(): string {
		return this.source.slice(this.startIndex, this.endIndex)
	}
}

/**
 * Attach positions and parent links to the raw nodes under a `source` root.
 */
export function buildTree(source: string, nodes: readonly RawNode[]): SyntaxTree {
	const lines = new LineIndex(source)
	const root = new TreeNode(
		{ children: nodes, end: source.length, isError: false, kind: 'source', start: 0 },
		source,
		lines
	)
	return { root, source }
}

function describeNode(node: SyntaxNode): string {
	const { startPosition: from, endPosition: to } = node
	const range = `[${from.row}:${from.column} - ${to.row}:${to.column}]`
	const error = node.isError ? ' ERROR' : ''
	const text = node.children.length === 0 ? ` ${JSON.stringify(node.text)}` : ''
	return `${node.kind}${error} ${range}${text}`
}

/**
 * Indented dump of a tree, one node per line.
 */
export function printTree(node: SyntaxNode, depth = 0): string {
	const lines = [`${'  '.repeat(depth)}${describeNode(node)}`]
	for (const child of node.children) {
		lines.push(printTree(child, depth + 1))
	}
	return lines.join('\n')
}

/**
 * Depth-first search for the first node of a kind.
 */
export function findFirst(node: SyntaxNode, kind: string): SyntaxNode | undefined {
	if (node.kind === kind) return node
	for (const child of node.children) {
		const found = findFirst(child, kind)
		if (found !== undefined) return found
	}
	return undefined
}
