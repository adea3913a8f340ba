import assert from 'node:assert'
import { describe, it } from 'node:test'
import { FormatContext } from '../../src/core/context.ts'
import type { CodeSection } from '../../src/core/sections.ts'
import { extractCodeSections } from '../../src/extract/extractor.ts'
import { createOptions, UsesSectionStyle } from '../../src/options/options.ts'
import { literal } from '../../src/replacements/replacement.ts'
import { parse } from '../../src/syntax/parser.ts'
import {
	applyModuleRenames,
	renderUsesSection,
	sortModules,
	transformUsesSection,
} from '../../src/transform/uses-section.ts'

function firstSection(source: string): CodeSection {
	const result = parse(source)
	assert.ok(result.tree)
	const [section] = extractCodeSections(result.tree.root)
	assert.ok(section)
	return section
}

const defaults = createOptions()

describe('transform/uses-section', () => {
	describe('applyModuleRenames', () => {
		it('should prefix exact matches', () => {
			assert.deepStrictEqual(applyModuleRenames(['Classes', 'SysUtils', 'Classes'], ['System:Classes']), [
				'System.Classes',
				'SysUtils',
				'System.Classes',
			])
		})

		it('should match names case-sensitively', () => {
			assert.deepStrictEqual(applyModuleRenames(['classes'], ['System:Classes']), ['classes'])
		})

		it('should apply rules one after another', () => {
			assert.deepStrictEqual(applyModuleRenames(['Forms'], ['Vcl:Forms', 'Legacy:Vcl.Forms']), [
				'Legacy.Vcl.Forms',
			])
		})

		it('should ignore rules without a separator', () => {
			assert.deepStrictEqual(applyModuleRenames(['Forms'], ['Forms']), ['Forms'])
		})
	})

	describe('sortModules', () => {
		it('should sort case-insensitively', () => {
			assert.deepStrictEqual(sortModules(['b', 'A', 'c'], []), ['A', 'b', 'c'])
		})

		it('should keep duplicates', () => {
			assert.deepStrictEqual(sortModules(['B', 'A', 'B'], []), ['A', 'B', 'B'])
		})

		it('should put prioritized namespaces first', () => {
			assert.deepStrictEqual(
				sortModules(['Vcl.Forms', 'System.SysUtils', 'Classes', 'system.Types'], ['System']),
				['System.SysUtils', 'system.Types', 'Classes', 'Vcl.Forms']
			)
		})

		it('should require the namespace separator', () => {
			assert.deepStrictEqual(sortModules(['SystemTools', 'Alpha'], ['System']), ['Alpha', 'SystemTools'])
		})
	})

	describe('renderUsesSection', () => {
		it('should put commas at the end of lines', () => {
			assert.strictEqual(renderUsesSection(['A', 'B'], defaults), 'uses\n  A,\n  B;')
		})

		it('should put commas at the beginning of lines', () => {
			const options = createOptions({ uses: { style: UsesSectionStyle.CommaAtTheBeginning } })
			assert.strictEqual(renderUsesSection(['A', 'B'], options), 'uses\n    A\n  , B\n  ;')
			assert.strictEqual(renderUsesSection(['A'], options), 'uses\n    A\n  ;')
		})

		it('should use the configured indentation and line ending', () => {
			const options = createOptions({ indentation: '\t', lineEnding: '\r\n' })
			assert.strictEqual(renderUsesSection(['A', 'B'], options), 'uses\r\n\tA,\r\n\tB;')
		})
	})

	describe('transformUsesSection', () => {
		it('should sort and lay out a one-line clause', () => {
			const source = 'uses B, A;'
			assert.deepStrictEqual(
				transformUsesSection(firstSection(source), defaults, source),
				literal(0, 10, 'uses\n  A,\n  B;', true)
			)
		})

		it('should apply renames, priorities and leading commas', () => {
			const source = 'uses Classes, System.SysUtils, System.Classes;'
			const options = createOptions({
				uses: {
					moduleNamesToUpdate: ['System:Classes'],
					overrideSortingOrder: ['System'],
					style: UsesSectionStyle.CommaAtTheBeginning,
				},
			})
			const replacement = transformUsesSection(firstSection(source), options, source)
			assert.deepStrictEqual(
				replacement,
				literal(
					0,
					source.length,
					'uses\n    System.Classes\n  , System.Classes\n  , System.SysUtils\n  ;',
					true
				)
			)
		})

		it('should apply the built-in renames', () => {
			const source = 'uses SysUtils, Classes;'
			const replacement = transformUsesSection(firstSection(source), defaults, source)
			assert.deepStrictEqual(replacement, literal(0, source.length, 'uses\n  System.Classes,\n  System.SysUtils;', true))
		})

		it('should return null for a clause that is already formatted', () => {
			const source = 'uses\n  A,\n  B;'
			assert.strictEqual(transformUsesSection(firstSection(source), defaults, source), null)
		})

		it('should start a new line after other code', () => {
			const source = 'x := 1; uses B, A;'
			assert.deepStrictEqual(
				transformUsesSection(firstSection(source), defaults, source),
				literal(8, 18, '\nuses\n  A,\n  B;', true)
			)
		})

		it('should replace indentation before the keyword', () => {
			const source = '  uses B, A;'
			assert.deepStrictEqual(
				transformUsesSection(firstSection(source), defaults, source),
				literal(0, 12, 'uses\n  A,\n  B;', true)
			)
		})

		it('should skip a clause with a comment and warn', () => {
			const source = 'uses B {keep}, A;'
			const context = new FormatContext(source)
			assert.strictEqual(transformUsesSection(firstSection(source), defaults, source, context), null)

			const [warning] = context.getWarnings()
			assert.strictEqual(warning?.def.code, 'PFFMT001')
			assert.strictEqual(warning?.message, 'uses clause skipped: contains a comment')
			assert.strictEqual(warning?.column, 1)
		})

		it('should skip a clause with a compiler directive', () => {
			const source = 'uses {$IFDEF X}B,{$ENDIF} A;'
			const context = new FormatContext(source)
			assert.strictEqual(transformUsesSection(firstSection(source), defaults, source, context), null)
			assert.strictEqual(context.getWarnings()[0]?.message, 'uses clause skipped: contains a compiler directive')
		})
	})
})
