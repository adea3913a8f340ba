import type { CodeSection, InheritedExpansion, ParsedNode } from '@pasfix/formatter'

function describeNode(source: string, node: ParsedNode): string {
	const { start, end } = node.span
	return `${node.kind} [${start}..${end}] ${JSON.stringify(source.slice(start, end))}`
}

/**
 * Text dump of what the extractor found, for `parse-debug`.
 */
export function describeSections(
	source: string,
	sections: readonly CodeSection[],
	expansions: readonly InheritedExpansion[]
): string {
	const lines: string[] = [`sections: ${sections.length}`]
	for (const section of sections) {
		lines.push(`  ${describeNode(source, section.keyword)}`)
		for (const sibling of section.siblings) {
			lines.push(`    ${describeNode(source, sibling)}`)
		}
	}
	lines.push(`inherited: ${expansions.length}`)
	for (const expansion of expansions) {
		lines.push(`  @${expansion.offset} ${expansion.routineName}(${expansion.argumentNames.join(', ')})`)
	}
	return lines.join('\n')
}
