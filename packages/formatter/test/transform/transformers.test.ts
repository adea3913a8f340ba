import assert from 'node:assert'
import { describe, it } from 'node:test'
import type { CodeSection } from '../../src/core/sections.ts'
import { extractCodeSections } from '../../src/extract/extractor.ts'
import { createOptions } from '../../src/options/options.ts'
import { literal } from '../../src/replacements/replacement.ts'
import { parse } from '../../src/syntax/parser.ts'
import { transformInheritedCalls } from '../../src/transform/inherited-calls.ts'
import { transformProcedureSection } from '../../src/transform/procedure-section.ts'
import { transformSingleKeywordSection } from '../../src/transform/single-keyword-section.ts'
import { transformUnitProgramSection } from '../../src/transform/unit-program-section.ts'

function firstSection(source: string): CodeSection {
	const result = parse(source)
	assert.ok(result.tree)
	const [section] = extractCodeSections(result.tree.root)
	assert.ok(section)
	return section
}

const defaults = createOptions()

describe('transform/unit-program-section', () => {
	it('should normalize keyword case and spacing', () => {
		const source = 'UNIT   Foo ;'
		assert.deepStrictEqual(
			transformUnitProgramSection(firstSection(source), defaults, source),
			literal(0, 12, 'unit Foo;')
		)
	})

	it('should normalize a program header', () => {
		const source = 'Program Demo;'
		assert.deepStrictEqual(
			transformUnitProgramSection(firstSection(source), defaults, source),
			literal(0, 13, 'program Demo;')
		)
	})

	it('should keep dotted names', () => {
		const source = 'Unit App.Main;'
		assert.deepStrictEqual(
			transformUnitProgramSection(firstSection(source), defaults, source),
			literal(0, 14, 'unit App.Main;')
		)
	})

	it('should return null when nothing changes', () => {
		const source = 'unit Foo;'
		assert.strictEqual(transformUnitProgramSection(firstSection(source), defaults, source), null)
	})

	it('should leave a program with parameters alone', () => {
		const source = 'PROGRAM P(input, output);'
		assert.strictEqual(transformUnitProgramSection(firstSection(source), defaults, source), null)
	})
})

describe('transform/single-keyword-section', () => {
	it('should lowercase the keyword', () => {
		const source = 'INTERFACE'
		assert.deepStrictEqual(
			transformSingleKeywordSection(firstSection(source), defaults, source),
			literal(0, 9, 'interface')
		)
	})

	it('should drop indentation before the keyword', () => {
		const source = 'x;\n  Implementation'
		assert.deepStrictEqual(
			transformSingleKeywordSection(firstSection(source), defaults, source),
			literal(3, 19, 'implementation')
		)
	})

	it('should return null for lowercase keywords', () => {
		const source = 'finalization'
		assert.strictEqual(transformSingleKeywordSection(firstSection(source), defaults, source), null)
	})
})

describe('transform/procedure-section', () => {
	it('should insert an empty parameter list after the name', () => {
		assert.deepStrictEqual(transformProcedureSection(firstSection('procedure Foo;')), literal(13, 13, '()'))
	})

	it('should insert after a qualified name', () => {
		assert.deepStrictEqual(
			transformProcedureSection(firstSection('function TFoo.Count: Integer;')),
			literal(19, 19, '()')
		)
	})
})

describe('transform/inherited-calls', () => {
	it('should spell out the call with its arguments', () => {
		assert.deepStrictEqual(
			transformInheritedCalls([{ argumentNames: ['AValue', 'A', 'B'], offset: 30, routineName: 'Update' }]),
			[literal(30, 30, ' Update(AValue, A, B)')]
		)
	})

	it('should use empty parentheses without arguments', () => {
		assert.deepStrictEqual(transformInheritedCalls([{ argumentNames: [], offset: 5, routineName: 'Run' }]), [
			literal(5, 5, ' Run()'),
		])
	})
})
