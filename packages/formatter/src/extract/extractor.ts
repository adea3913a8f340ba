/**
 * Section extractor: walks the syntax tree and turns recognized constructs
 * into tree-independent `CodeSection` records.
 *
 * A section is only produced when neither its keyword, nor the construct
 * around it, nor any of the collected siblings carries a parse error.
 */

import { type CodeSection, isSingleKeywordKind, type ParsedNode, SectionKind } from '../core/sections.ts'
import type { SyntaxNode } from '../syntax/tree.ts'

const KEYWORD_SECTIONS: ReadonlyMap<string, SectionKind> = new Map([
	['kUses', SectionKind.Uses],
	['kUnit', SectionKind.Unit],
	['kProgram', SectionKind.Program],
	['kInterface', SectionKind.Interface],
	['kImplementation', SectionKind.Implementation],
	['kInitialization', SectionKind.Initialization],
	['kFinalization', SectionKind.Finalization],
])

const ROUTINE_SECTIONS: ReadonlyMap<string, SectionKind> = new Map([
	['kProcedure', SectionKind.ProcedureDeclaration],
	['kConstructor', SectionKind.ProcedureDeclaration],
	['kDestructor', SectionKind.ProcedureDeclaration],
	['kFunction', SectionKind.FunctionDeclaration],
	['kOperator', SectionKind.FunctionDeclaration],
])

export function toParsedNode(node: SyntaxNode, kind: SectionKind): ParsedNode {
	return {
		kind,
		span: {
			end: node.endIndex,
			endPosition: node.endPosition,
			start: node.startIndex,
			startPosition: node.startPosition,
		},
	}
}

/**
 * Classify a sibling of a uses/unit/program keyword.
 * Returns undefined for separators, which are not kept.
 */
function classifySibling(node: SyntaxNode, section: SectionKind): SectionKind | undefined {
	switch (node.kind) {
		case 'moduleName':
		case 'identifier':
			return SectionKind.Module
		case 'comment':
			return SectionKind.Comment
		case 'pp':
			return SectionKind.Preprocessor
		case ',':
			return undefined
		case ';':
		case 'kEnd':
			return SectionKind.Semicolon
		default:
			// Anything else in a header (e.g. a program parameter list) disqualifies it.
			return section === SectionKind.Uses ? SectionKind.Module : SectionKind.Identifier
	}
}

function buildKeywordSection(keyword: SyntaxNode, kind: SectionKind): CodeSection | null {
	const parent = keyword.parent
	if (keyword.hasError || parent === null || parent.hasError) return null

	const siblings: ParsedNode[] = []
	let terminated = false

	for (const child of parent.children) {
		if (child === keyword) continue
		if (child.hasError) return null

		const siblingKind = classifySibling(child, kind)
		if (siblingKind === undefined) continue

		siblings.push(toParsedNode(child, siblingKind))
		if (siblingKind === SectionKind.Semicolon) {
			terminated = true
			break
		}
	}

	if (!terminated) return null
	return { keyword: toParsedNode(keyword, kind), siblings }
}

function buildSingleKeywordSection(keyword: SyntaxNode, kind: SectionKind): CodeSection | null {
	if (keyword.hasError) return null
	return { keyword: toParsedNode(keyword, kind), siblings: [] }
}

/**
 * A routine declaration without a parameter list.
 */
function buildRoutineSection(declaration: SyntaxNode): CodeSection | null {
	if (declaration.hasError) return null

	let keyword: ParsedNode | undefined
	let name: SyntaxNode | undefined

	for (const child of declaration.children) {
		const routineKind = ROUTINE_SECTIONS.get(child.kind)
		if (routineKind !== undefined) {
			keyword = toParsedNode(child, routineKind)
		} else if (child.kind === 'routineName') {
			name = child
		} else if (child.kind === 'declArgs') {
			return null
		} else if (child.kind === ';') {
			if (keyword === undefined || name === undefined) return null
			return {
				keyword,
				siblings: [
					toParsedNode(name, SectionKind.Identifier),
					toParsedNode(child, SectionKind.Semicolon),
				],
			}
		}
	}

	return null
}

function traverse(node: SyntaxNode, sections: CodeSection[]): void {
	const keywordKind = KEYWORD_SECTIONS.get(node.kind)
	if (keywordKind !== undefined) {
		const section = isSingleKeywordKind(keywordKind)
			? buildSingleKeywordSection(node, keywordKind)
			: buildKeywordSection(node, keywordKind)
		if (section !== null) sections.push(section)
		return
	}

	if (node.kind === 'declProc') {
		const section = buildRoutineSection(node)
		if (section !== null) sections.push(section)
		return
	}

	for (const child of node.children) {
		traverse(child, sections)
	}
}

/**
 * Collect all code sections in document order.
 */
export function extractCodeSections(root: SyntaxNode): CodeSection[] {
	const sections: CodeSection[] = []
	traverse(root, sections)
	return sections
}
