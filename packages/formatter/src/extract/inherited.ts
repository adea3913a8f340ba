/**
 * Finds bare `inherited;` statements that can be spelled out as explicit
 * calls to the overridden routine.
 */

import type { InheritedExpansion } from '../core/sections.ts'
import type { SyntaxNode } from '../syntax/tree.ts'

function childOfKind(node: SyntaxNode, kind: string): SyntaxNode | undefined {
	return node.children.find((child) => child.kind === kind)
}

/**
 * The last identifier of a possibly qualified name, e.g. `Update` in `TChild.Update`.
 */
function routineName(declaration: SyntaxNode): string | undefined {
	const name = childOfKind(declaration, 'routineName')
	if (name === undefined) return undefined
	const identifiers = name.children.filter((child) => child.kind === 'identifier')
	return identifiers[identifiers.length - 1]?.text
}

/**
 * Parameter names across all groups, in declaration order.
 */
function argumentNames(declaration: SyntaxNode): string[] {
	const args = childOfKind(declaration, 'declArgs')
	if (args === undefined) return []

	const names: string[] = []
	for (const group of args.children) {
		if (group.kind !== 'declArg') continue
		for (const child of group.children) {
			if (child.kind === ':') break
			if (child.kind === 'identifier') names.push(child.text)
		}
	}
	return names
}

/**
 * Offsets right after each bare `inherited` in a routine body.
 * Nested routines are not searched; they are visited on their own.
 */
function bareInheritedOffsets(node: SyntaxNode, source: string, offsets: number[]): void {
	for (const child of node.children) {
		if (child.kind === 'defProc') continue
		if (child.kind === 'statement' && !child.hasError) {
			const [keyword, semicolon] = child.children
			if (
				keyword?.kind === 'kInherited' &&
				semicolon?.kind === ';' &&
				source.slice(keyword.endIndex, semicolon.startIndex).trim() === ''
			) {
				offsets.push(keyword.endIndex)
			}
			continue
		}
		bareInheritedOffsets(child, source, offsets)
	}
}

function collectFromRoutine(definition: SyntaxNode, source: string, expansions: InheritedExpansion[]): void {
	if (definition.hasError) return

	const declaration = childOfKind(definition, 'declProc')
	const body = childOfKind(definition, 'block')
	if (declaration === undefined || body === undefined) return

	const name = routineName(declaration)
	if (name === undefined) return

	const names = argumentNames(declaration)
	const offsets: number[] = []
	bareInheritedOffsets(body, source, offsets)

	for (const offset of offsets) {
		expansions.push({ argumentNames: names, offset, routineName: name })
	}
}

function visit(node: SyntaxNode, source: string, expansions: InheritedExpansion[]): void {
	if (node.kind === 'defProc') {
		collectFromRoutine(node, source, expansions)
	}
	for (const child of node.children) {
		visit(child, source, expansions)
	}
}

/**
 * Collect every bare `inherited;` inside routine definitions.
 */
export function collectInheritedExpansions(root: SyntaxNode, source: string): InheritedExpansion[] {
	const expansions: InheritedExpansion[] = []
	visit(root, source, expansions)
	return expansions.sort((a, b) => a.offset - b.offset)
}
