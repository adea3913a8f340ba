/**
 * Formatting options.
 *
 * Options are plain immutable values passed explicitly into every transformer
 * and into the text scanner. The configuration file layer lives in the CLI.
 */

import { readFileSync } from 'node:fs'
import { OperatorClass } from '../text/operators.ts'

/** How whitespace around an operator class is normalized. */
export const SpaceOperation = {
	After: 'After',
	Before: 'Before',
	BeforeAndAfter: 'BeforeAndAfter',
	NoChange: 'NoChange',
} as const

export type SpaceOperation = (typeof SpaceOperation)[keyof typeof SpaceOperation]

/** Layout of a reformatted uses clause. */
export const UsesSectionStyle = {
	CommaAtTheBeginning: 'CommaAtTheBeginning',
	CommaAtTheEnd: 'CommaAtTheEnd',
} as const

export type UsesSectionStyle = (typeof UsesSectionStyle)[keyof typeof UsesSectionStyle]

/** One spacing policy per operator class. */
export type SpacingTable = Readonly<Record<OperatorClass, SpaceOperation>>

export interface TextChangeOptions {
	readonly spacing: SpacingTable
	/** Leave `:` alone when digits surround it, e.g. `12:34:56` */
	readonly colonNumericException: boolean
	readonly trimTrailingWhitespace: boolean
}

export interface UsesSectionOptions {
	readonly style: UsesSectionStyle
	/** Namespaces sorted ahead of everything else, e.g. `System` */
	readonly overrideSortingOrder: readonly string[]
	/** Rename rules of the form `Prefix:Name` */
	readonly moduleNamesToUpdate: readonly string[]
}

export interface TransformationOptions {
	readonly usesSection: boolean
	readonly unitProgramSection: boolean
	readonly singleKeywordSections: boolean
	readonly procedureSection: boolean
	readonly inheritedCalls: boolean
	readonly textTransformations: boolean
}

export interface FormatOptions {
	/** One indentation unit */
	readonly indentation: string
	/** Line ending used for line breaks the formatter inserts */
	readonly lineEnding: string
	readonly uses: UsesSectionOptions
	readonly transformations: TransformationOptions
	readonly textChanges: TextChangeOptions
}

/**
 * Overrides accepted by `createOptions`; nested groups merge with the defaults.
 */
export interface OptionsOverrides {
	readonly indentation?: string
	readonly lineEnding?: string
	readonly uses?: Partial<UsesSectionOptions>
	readonly transformations?: Partial<TransformationOptions>
	readonly textChanges?: {
		readonly spacing?: Partial<SpacingTable>
		readonly colonNumericException?: boolean
		readonly trimTrailingWhitespace?: boolean
	}
}

export const DEFAULT_SPACING: SpacingTable = {
	[OperatorClass.Add]: SpaceOperation.BeforeAndAfter,
	[OperatorClass.Assign]: SpaceOperation.BeforeAndAfter,
	[OperatorClass.AssignAdd]: SpaceOperation.BeforeAndAfter,
	[OperatorClass.AssignDiv]: SpaceOperation.BeforeAndAfter,
	[OperatorClass.AssignMul]: SpaceOperation.BeforeAndAfter,
	[OperatorClass.AssignSub]: SpaceOperation.BeforeAndAfter,
	[OperatorClass.Colon]: SpaceOperation.After,
	[OperatorClass.Comma]: SpaceOperation.After,
	[OperatorClass.Eq]: SpaceOperation.BeforeAndAfter,
	[OperatorClass.FDiv]: SpaceOperation.BeforeAndAfter,
	// `<` and `>` also delimit generic arguments; a lexical pass cannot tell them apart.
	[OperatorClass.Gt]: SpaceOperation.NoChange,
	[OperatorClass.Gte]: SpaceOperation.BeforeAndAfter,
	[OperatorClass.Lt]: SpaceOperation.NoChange,
	[OperatorClass.Lte]: SpaceOperation.BeforeAndAfter,
	[OperatorClass.Mul]: SpaceOperation.BeforeAndAfter,
	[OperatorClass.Neq]: SpaceOperation.BeforeAndAfter,
	[OperatorClass.Semicolon]: SpaceOperation.After,
	[OperatorClass.Sub]: SpaceOperation.BeforeAndAfter,
}

let defaultModuleRenames: readonly string[] | undefined

/**
 * Built-in `Prefix:Name` rename rules for the scoped RTL, VCL and FMX units.
 */
export function getDefaultModuleRenames(): readonly string[] {
	if (defaultModuleRenames === undefined) {
		const content = readFileSync(new URL('./default-module-renames.json', import.meta.url), 'utf-8')
		const parsed: unknown = JSON.parse(content)
		if (!Array.isArray(parsed) || !parsed.every((entry): entry is string => typeof entry === 'string')) {
			throw new Error('default-module-renames.json must be an array of strings')
		}
		defaultModuleRenames = Object.freeze([...parsed])
	}
	return defaultModuleRenames
}

export function createDefaultOptions(): FormatOptions {
	return {
		indentation: '  ',
		lineEnding: '\n',
		textChanges: {
			colonNumericException: true,
			spacing: DEFAULT_SPACING,
			trimTrailingWhitespace: true,
		},
		transformations: {
			inheritedCalls: true,
			procedureSection: true,
			singleKeywordSections: true,
			textTransformations: true,
			unitProgramSection: true,
			usesSection: true,
		},
		uses: {
			moduleNamesToUpdate: getDefaultModuleRenames(),
			overrideSortingOrder: [],
			style: UsesSectionStyle.CommaAtTheEnd,
		},
	}
}

/**
 * Default options with the given groups merged on top.
 */
export function createOptions(overrides: OptionsOverrides = {}, base = createDefaultOptions()): FormatOptions {
	const textChanges: NonNullable<OptionsOverrides['textChanges']> = overrides.textChanges ?? {}
	return {
		indentation: overrides.indentation ?? base.indentation,
		lineEnding: overrides.lineEnding ?? base.lineEnding,
		textChanges: {
			colonNumericException: textChanges.colonNumericException ?? base.textChanges.colonNumericException,
			spacing: { ...base.textChanges.spacing, ...textChanges.spacing },
			trimTrailingWhitespace: textChanges.trimTrailingWhitespace ?? base.textChanges.trimTrailingWhitespace,
		},
		transformations: { ...base.transformations, ...overrides.transformations },
		uses: { ...base.uses, ...overrides.uses },
	}
}

export function hasSpaceBefore(operation: SpaceOperation): boolean {
	return operation === SpaceOperation.Before || operation === SpaceOperation.BeforeAndAfter
}

export function hasSpaceAfter(operation: SpaceOperation): boolean {
	return operation === SpaceOperation.After || operation === SpaceOperation.BeforeAndAfter
}
