/**
 * Uses clause transformer: renames, sorts and lays out the imported units.
 */

import type { FormatContext } from '../core/context.ts'
import { type CodeSection, nodeText, SectionKind } from '../core/sections.ts'
import { type FormatOptions, UsesSectionStyle } from '../options/options.ts'
import type { TextReplacement } from '../replacements/replacement.ts'
import { adjustReplacementForLinePosition, createReplacementIfDifferent } from './line-position.ts'

/**
 * Apply `Prefix:Name` rules in order: a module spelled exactly `Name`
 * becomes `Prefix.Name`.
 */
export function applyModuleRenames(modules: readonly string[], rules: readonly string[]): string[] {
	const result = [...modules]
	for (const rule of rules) {
		const separator = rule.indexOf(':')
		if (separator < 0) continue
		const prefix = rule.slice(0, separator)
		const name = rule.slice(separator + 1)
		for (let i = 0; i < result.length; i++) {
			if (result[i] === name) {
				result[i] = `${prefix}.${name}`
			}
		}
	}
	return result
}

function compareIgnoringCase(a: string, b: string): number {
	const left = a.toLowerCase()
	const right = b.toLowerCase()
	if (left < right) return -1
	if (left > right) return 1
	return 0
}

/**
 * Sort case-insensitively. Modules inside one of the `priority` namespaces
 * (`System` matches `System.Classes`) come first.
 */
export function sortModules(modules: readonly string[], priority: readonly string[]): string[] {
	if (priority.length === 0) {
		return [...modules].sort(compareIgnoringCase)
	}

	const prefixes = priority.map((namespace) => `${namespace.toLowerCase()}.`)
	const prioritized: string[] = []
	const rest: string[] = []
	for (const module of modules) {
		const lower = module.toLowerCase()
		if (prefixes.some((prefix) => lower.startsWith(prefix))) {
			prioritized.push(module)
		} else {
			rest.push(module)
		}
	}

	return [...prioritized.sort(compareIgnoringCase), ...rest.sort(compareIgnoringCase)]
}

/**
 * Render the clause text, from `uses` to the closing semicolon.
 */
export function renderUsesSection(modules: readonly string[], options: FormatOptions): string {
	const { indentation, lineEnding } = options

	if (options.uses.style === UsesSectionStyle.CommaAtTheBeginning) {
		const [first, ...rest] = modules
		const lines = [`uses`, `${indentation}  ${first ?? ''}`]
		for (const module of rest) {
			lines.push(`${indentation}, ${module}`)
		}
		lines.push(`${indentation};`)
		return lines.join(lineEnding)
	}

	const body = modules.map((module) => `${indentation}${module}`).join(`,${lineEnding}`)
	return `uses${lineEnding}${body};`
}

/**
 * The final replacement that lays out the clause, even when it reproduces the
 * source. Null when the clause is left as written.
 */
export function layoutUsesSection(
	section: CodeSection,
	options: FormatOptions,
	source: string,
	context?: FormatContext
): TextReplacement | null {
	const blocker = section.siblings.find(
		(sibling) => sibling.kind === SectionKind.Comment || sibling.kind === SectionKind.Preprocessor
	)
	if (blocker !== undefined) {
		context?.emitAtOffset('PFFMT001', section.keyword.span.start, {
			what: blocker.kind === SectionKind.Comment ? 'comment' : 'compiler directive',
		})
		return null
	}

	const terminator = section.siblings[section.siblings.length - 1]
	if (terminator === undefined || terminator.kind !== SectionKind.Semicolon) return null

	const modules = section.siblings
		.filter((sibling) => sibling.kind === SectionKind.Module)
		.map((sibling) => nodeText(source, sibling))
	if (modules.length === 0) return null

	const renamed = applyModuleRenames(modules, options.uses.moduleNamesToUpdate)
	const sorted = sortModules(renamed, options.uses.overrideSortingOrder)
	const text = renderUsesSection(sorted, options)

	return adjustReplacementForLinePosition(
		source,
		section.keyword.span.start,
		terminator.span.end,
		text,
		options.lineEnding,
		true
	)
}

export function transformUsesSection(
	section: CodeSection,
	options: FormatOptions,
	source: string,
	context?: FormatContext
): TextReplacement | null {
	const replacement = layoutUsesSection(section, options, source, context)
	return replacement === null ? null : createReplacementIfDifferent(source, replacement)
}
