import type { InheritedExpansion } from '../core/sections.ts'
import { literal, type TextReplacement } from '../replacements/replacement.ts'

/**
 * Spell out bare `inherited;` as `inherited Name(Arg1, Arg2);`.
 */
export function transformInheritedCalls(expansions: readonly InheritedExpansion[]): TextReplacement[] {
	return expansions.map((expansion) => {
		const args = expansion.argumentNames.join(', ')
		return literal(expansion.offset, expansion.offset, ` ${expansion.routineName}(${args})`)
	})
}
