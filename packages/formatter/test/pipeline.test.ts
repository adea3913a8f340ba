import assert from 'node:assert'
import { describe, it } from 'node:test'
import { FormatContext } from '../src/core/context.ts'
import { createOptions, type FormatOptions, SpaceOperation } from '../src/options/options.ts'
import { formatSource, produceReplacements } from '../src/pipeline.ts'
import { literal } from '../src/replacements/replacement.ts'

const defaults = createOptions()

function format(source: string, options = defaults): string {
	return formatSource(source, options).text
}

describe('pipeline', () => {
	describe('produceReplacements', () => {
		it('should return one final replacement for a one-line uses clause', () => {
			assert.deepStrictEqual(produceReplacements('uses B, A;', defaults), [
				literal(0, 10, 'uses\n  A,\n  B;', true),
			])
		})

		it('should return nothing for formatted source', () => {
			assert.deepStrictEqual(produceReplacements('unit Foo;\n\ninterface\n\nimplementation\n\nend.', defaults), [])
		})

		it('should return nothing for empty source', () => {
			assert.deepStrictEqual(produceReplacements('', defaults), [])
		})

		it('should return replacements sorted by start', () => {
			const replacements = produceReplacements('UNIT Foo;\nx:=1;\nINTERFACE', defaults)
			assert.deepStrictEqual(
				replacements.map((r) => r.start),
				[0, 9, 16]
			)
		})

		it('should report skipped uses clauses on the context', () => {
			const source = 'uses B {c},A;'
			const context = new FormatContext(source, 'Main.pas')
			produceReplacements(source, defaults, context)
			assert.deepStrictEqual(
				context.getDiagnostics().map((d) => d.def.code),
				['PFFMT001']
			)
		})
	})

	describe('formatSource', () => {
		it('should format a complete unit', () => {
			const source =
				'UNIT Foo;\n\nINTERFACE\n\nuses B, A;\n\nImplementation\n\nprocedure Bar;\nbegin\nend;\n\nend.'
			assert.strictEqual(
				format(source),
				'unit Foo;\n\ninterface\n\nuses\n  A,\n  B;\n\nimplementation\n\nprocedure Bar();\nbegin\nend;\n\nend.'
			)
		})

		it('should expand bare inherited calls', () => {
			const source =
				'procedure TChild.Update(var AValue: Integer; A, B: Integer);\nbegin\n  inherited;\nend;'
			assert.strictEqual(
				format(source),
				'procedure TChild.Update(var AValue: Integer; A, B: Integer);\nbegin\n  inherited Update(AValue, A, B);\nend;'
			)
		})

		it('should combine the inserted parameter list with the inherited call', () => {
			const source = 'function TFoo.Get:Integer;\nbegin\n  inherited;\nend;'
			assert.strictEqual(
				format(source),
				'function TFoo.Get(): Integer;\nbegin\n  inherited Get();\nend;'
			)
		})

		it('should move a header after other code to its own line', () => {
			assert.strictEqual(format('x := 1; unit Foo;'), 'x := 1;\nunit Foo;')
		})

		it('should return the replacements it applied', () => {
			const result = formatSource('procedure Foo;', defaults)
			assert.strictEqual(result.text, 'procedure Foo();')
			assert.deepStrictEqual(result.replacements, [literal(13, 13, '()')])
		})

		it('should not rescan the uses clause', () => {
			const options = createOptions({ textChanges: { spacing: { comma: SpaceOperation.BeforeAndAfter } } })
			assert.strictEqual(format('uses B, A;\nx(a,b);', options), 'uses\n  A,\n  B;\nx(a , b);')
		})

		it('should leave a uses clause with a comment in place but still fix spacing', () => {
			assert.strictEqual(format('uses B {c},A;'), 'uses B {c}, A;')
		})

		it('should leave sections with parse errors alone', () => {
			assert.strictEqual(format('uses A, ;\nprocedure Foo;'), 'uses A, ;\nprocedure Foo();')
		})

		it('should keep CRLF line endings when configured', () => {
			const options = createOptions({ lineEnding: '\r\n' })
			assert.strictEqual(format('unit Foo;\r\nuses B, A;\r\n', options), 'unit Foo;\r\nuses\r\n  A,\r\n  B;\r\n')
		})

		it('should trim trailing whitespace', () => {
			assert.strictEqual(format('unit Foo;   \ninterface  \n'), 'unit Foo;\ninterface\n')
		})
	})

	describe('spacing across section boundaries', () => {
		const spaced = (colon: SpaceOperation, semicolon: SpaceOperation) =>
			createOptions({ textChanges: { spacing: { colon, semicolon } } })

		const cases: ReadonlyArray<{ source: string; expected: string; options: FormatOptions }> = [
			{ expected: 'uses\n  A; x := 1;', options: defaults, source: 'uses A;x:=1;' },
			{ expected: 'unit Foo; x := 1;', options: defaults, source: 'UNIT Foo;x:=1;' },
			{ expected: 'unit Foo; interface', options: defaults, source: 'unit  Foo;interface' },
			{
				expected: 'function Foo() : Integer;',
				options: spaced(SpaceOperation.BeforeAndAfter, SpaceOperation.After),
				source: 'function Foo: Integer;',
			},
			{
				expected: 'procedure Foo() ; begin inherited Foo() ; end ;',
				options: spaced(SpaceOperation.After, SpaceOperation.BeforeAndAfter),
				source: 'procedure Foo;begin inherited;end;',
			},
		]

		for (const { source, expected, options } of cases) {
			it(`should format ${JSON.stringify(source)} in one pass`, () => {
				const once = format(source, options)
				assert.strictEqual(once, expected)
				assert.deepStrictEqual(produceReplacements(once, options), [])
			})
		}

		it('should keep a formatted uses clause out of the text pass', () => {
			const options = spaced(SpaceOperation.After, SpaceOperation.BeforeAndAfter)
			const once = format('uses B,A;\nx:=1;', options)
			assert.strictEqual(once, 'uses\n  A,\n  B;\nx := 1 ;')
			assert.deepStrictEqual(produceReplacements(once, options), [])
		})
	})

	describe('transformation flags', () => {
		it('should only fix spacing when section transformers are disabled', () => {
			const options = createOptions({
				transformations: {
					inheritedCalls: false,
					procedureSection: false,
					singleKeywordSections: false,
					unitProgramSection: false,
					usesSection: false,
				},
			})
			assert.strictEqual(
				format('UNIT Foo;\nuses B,A;\nprocedure Run;\nbegin\n  inherited;\nend;', options),
				'UNIT Foo;\nuses B, A;\nprocedure Run;\nbegin\n  inherited;\nend;'
			)
		})

		it('should skip the text pass when disabled', () => {
			const options = createOptions({ transformations: { textTransformations: false } })
			assert.strictEqual(format('procedure Foo;\nx:=1;   ', options), 'procedure Foo();\nx:=1;   ')
		})
	})
})
