import { type CodeSection, SectionKind } from '../core/sections.ts'
import { literal, type TextReplacement } from '../replacements/replacement.ts'

/**
 * Add an empty parameter list to a routine declared without one:
 * `procedure Foo;` becomes `procedure Foo();`.
 */
export function transformProcedureSection(section: CodeSection): TextReplacement | null {
	const [name, next] = section.siblings
	if (name?.kind !== SectionKind.Identifier || next?.kind !== SectionKind.Semicolon) {
		return null
	}
	return literal(name.span.end, name.span.end, '()')
}
