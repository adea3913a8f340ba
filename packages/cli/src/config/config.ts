/**
 * The `pasfix.toml` document model.
 *
 * ```toml
 * indentation = "  "
 * line_ending = "Auto"            # Auto | Crlf | Lf
 * exclude_files = ["generated/**"]
 * custom_config_patterns = [["legacy/**", "legacy.toml"]]
 *
 * [uses_section]
 * uses_section_style = "CommaAtTheEnd"
 * override_sorting_order = ["System"]
 * module_names_to_update = ["System:Classes"]
 *
 * [transformations]
 * enable_uses_section = true
 *
 * [text_changes]
 * comma = "After"
 * trim_trailing_whitespace = true
 * ```
 */

import { EOL } from 'node:os'
import { formatDiagnosticLine, PFCFG001, PFCFG003 } from '@pasfix/diagnostics'
import {
	createDefaultOptions,
	type FormatOptions,
	OperatorClass,
	SpaceOperation,
	type SpacingTable,
	UsesSectionStyle,
} from '@pasfix/formatter'
import { parse } from 'smol-toml'
import { getErrorMessage } from '../utils.ts'
import { FieldReader, type Table } from './fields.ts'

export const CONFIG_FILE_NAME = 'pasfix.toml'

export const LineEndingSetting = {
	Auto: 'Auto',
	Crlf: 'Crlf',
	Lf: 'Lf',
} as const

export type LineEndingSetting = (typeof LineEndingSetting)[keyof typeof LineEndingSetting]

/** `[text_changes]` keys in file order. */
export const TEXT_CHANGE_KEYS: ReadonlyArray<readonly [string, OperatorClass]> = [
	['comma', OperatorClass.Comma],
	['semi_colon', OperatorClass.Semicolon],
	['colon', OperatorClass.Colon],
	['lt', OperatorClass.Lt],
	['eq', OperatorClass.Eq],
	['neq', OperatorClass.Neq],
	['gt', OperatorClass.Gt],
	['lte', OperatorClass.Lte],
	['gte', OperatorClass.Gte],
	['add', OperatorClass.Add],
	['sub', OperatorClass.Sub],
	['mul', OperatorClass.Mul],
	['fdiv', OperatorClass.FDiv],
	['assign', OperatorClass.Assign],
	['assign_add', OperatorClass.AssignAdd],
	['assign_sub', OperatorClass.AssignSub],
	['assign_mul', OperatorClass.AssignMul],
	['assign_div', OperatorClass.AssignDiv],
]

export interface CustomConfigPattern {
	readonly pattern: string
	/** Relative paths are resolved against the directory of the declaring config */
	readonly configPath: string
}

export interface PasfixConfig {
	/** File the configuration was read from; null for the built-in defaults */
	readonly path: string | null
	readonly options: FormatOptions
	readonly excludeFiles: readonly string[]
	readonly customConfigPatterns: readonly CustomConfigPattern[]
}

export interface LoadedConfig {
	readonly config: PasfixConfig
	/** Formatted `[PFCFGxxx] ...` lines */
	readonly warnings: readonly string[]
}

const SPACE_OPERATIONS = Object.values(SpaceOperation)
const LINE_ENDINGS = Object.values(LineEndingSetting)
const USES_STYLES = Object.values(UsesSectionStyle)

export function resolveLineEnding(setting: LineEndingSetting): string {
	switch (setting) {
		case LineEndingSetting.Crlf:
			return '\r\n'
		case LineEndingSetting.Lf:
			return '\n'
		case LineEndingSetting.Auto:
			return EOL
	}
}

function readPatterns(reader: FieldReader, key: string, warnings: string[]): string[] {
	return reader.stringArray(key, []).filter((pattern) => {
		if (pattern.trim() !== '') return true
		warnings.push(formatDiagnosticLine(PFCFG003, { pattern }))
		return false
	})
}

function readSpacing(reader: FieldReader, defaults: SpacingTable): SpacingTable {
	const spacing: Record<OperatorClass, SpaceOperation> = { ...defaults }
	for (const [key, operatorClass] of TEXT_CHANGE_KEYS) {
		spacing[operatorClass] = reader.oneOf(key, SPACE_OPERATIONS, defaults[operatorClass])
	}
	return spacing
}

/**
 * Build a configuration from a parsed TOML table, falling back per field.
 */
export function configFromTable(table: Table, path: string | null, warnings: string[]): PasfixConfig {
	const defaults = createDefaultOptions()
	const root = new FieldReader(table, warnings)

	const uses = root.table('uses_section')
	const transformations = root.table('transformations')
	const textChanges = root.table('text_changes')

	const customConfigPatterns = root.pairs('custom_config_patterns').flatMap(([pattern, configPath]) => {
		if (pattern.trim() !== '') return [{ configPath, pattern }]
		warnings.push(formatDiagnosticLine(PFCFG003, { pattern }))
		return []
	})

	return {
		customConfigPatterns,
		excludeFiles: readPatterns(root, 'exclude_files', warnings),
		options: {
			indentation: root.string('indentation', defaults.indentation),
			lineEnding: resolveLineEnding(root.oneOf('line_ending', LINE_ENDINGS, LineEndingSetting.Auto)),
			textChanges: {
				colonNumericException: textChanges.boolean(
					'colon_numeric_exception',
					defaults.textChanges.colonNumericException
				),
				spacing: readSpacing(textChanges, defaults.textChanges.spacing),
				trimTrailingWhitespace: textChanges.boolean(
					'trim_trailing_whitespace',
					defaults.textChanges.trimTrailingWhitespace
				),
			},
			transformations: {
				inheritedCalls: transformations.boolean('enable_inherited_calls', defaults.transformations.inheritedCalls),
				procedureSection: transformations.boolean(
					'enable_procedure_section',
					defaults.transformations.procedureSection
				),
				singleKeywordSections: transformations.boolean(
					'enable_single_keyword_sections',
					defaults.transformations.singleKeywordSections
				),
				textTransformations: transformations.boolean(
					'enable_text_transformations',
					defaults.transformations.textTransformations
				),
				unitProgramSection: transformations.boolean(
					'enable_unit_program_section',
					defaults.transformations.unitProgramSection
				),
				usesSection: transformations.boolean('enable_uses_section', defaults.transformations.usesSection),
			},
			uses: {
				moduleNamesToUpdate: uses.stringArray('module_names_to_update', defaults.uses.moduleNamesToUpdate),
				overrideSortingOrder: uses.stringArray('override_sorting_order', defaults.uses.overrideSortingOrder),
				style: uses.oneOf('uses_section_style', USES_STYLES, defaults.uses.style),
			},
		},
		path,
	}
}

/**
 * The built-in configuration.
 */
export function defaultConfig(): PasfixConfig {
	return configFromTable({}, null, [])
}

/**
 * Parse `pasfix.toml` text. Malformed TOML yields the defaults and a PFCFG001 warning.
 */
export function parseConfig(text: string, path: string): LoadedConfig {
	const warnings: string[] = []
	let table: Table
	try {
		table = parse(text)
	} catch (error: unknown) {
		warnings.push(formatDiagnosticLine(PFCFG001, { path, reason: getErrorMessage(error) }))
		return { config: { ...defaultConfig(), path }, warnings }
	}
	return { config: configFromTable(table, path, warnings), warnings }
}

/**
 * The document `init-config` writes: every setting at its default.
 */
export function defaultConfigDocument(): Record<string, unknown> {
	const { textChanges, transformations, uses, indentation } = createDefaultOptions()
	return {
		custom_config_patterns: [],
		exclude_files: [],
		indentation,
		line_ending: LineEndingSetting.Auto,
		text_changes: {
			...Object.fromEntries(TEXT_CHANGE_KEYS.map(([key, operatorClass]) => [key, textChanges.spacing[operatorClass]])),
			colon_numeric_exception: textChanges.colonNumericException,
			trim_trailing_whitespace: textChanges.trimTrailingWhitespace,
		},
		transformations: {
			enable_inherited_calls: transformations.inheritedCalls,
			enable_procedure_section: transformations.procedureSection,
			enable_single_keyword_sections: transformations.singleKeywordSections,
			enable_text_transformations: transformations.textTransformations,
			enable_unit_program_section: transformations.unitProgramSection,
			enable_uses_section: transformations.usesSection,
		},
		uses_section: {
			module_names_to_update: [...uses.moduleNamesToUpdate],
			override_sorting_order: [...uses.overrideSortingOrder],
			uses_section_style: uses.style,
		},
	}
}
