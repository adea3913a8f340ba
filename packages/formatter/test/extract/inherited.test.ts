import assert from 'node:assert'
import { describe, it } from 'node:test'
import type { InheritedExpansion } from '../../src/core/sections.ts'
import { collectInheritedExpansions } from '../../src/extract/inherited.ts'
import { parse } from '../../src/syntax/parser.ts'

function collect(source: string): InheritedExpansion[] {
	const result = parse(source)
	assert.ok(result.tree)
	return collectInheritedExpansions(result.tree.root, source)
}

describe('extract/inherited', () => {
	it('should collect the routine name and every parameter name', () => {
		const source =
			'procedure TChild.Update(var AValue: Integer; A, B: Integer);\nbegin\n  inherited;\nend;'
		assert.deepStrictEqual(collect(source), [
			{
				argumentNames: ['AValue', 'A', 'B'],
				offset: source.indexOf('inherited') + 'inherited'.length,
				routineName: 'Update',
			},
		])
	})

	it('should collect routines without parameters', () => {
		const source = 'function TFoo.GetValue: Integer;\nbegin\n  inherited;\nend;'
		const [expansion] = collect(source)
		assert.strictEqual(expansion?.routineName, 'GetValue')
		assert.deepStrictEqual(expansion?.argumentNames, [])
	})

	it('should find statements inside nested blocks', () => {
		const source = 'procedure TFoo.Run;\nbegin\n  if Ready then\n  begin\n    inherited;\n  end;\nend;'
		assert.strictEqual(collect(source).length, 1)
	})

	it('should ignore inherited calls that already name a routine', () => {
		const source = 'procedure TFoo.Run;\nbegin\n  inherited Run;\nend;'
		assert.deepStrictEqual(collect(source), [])
	})

	it('should attribute statements to the innermost routine', () => {
		const source = [
			'procedure TA.Outer(X: Integer);',
			'  procedure Inner;',
			'  begin',
			'    inherited;',
			'  end;',
			'begin',
			'  inherited;',
			'end;',
		].join('\n')
		assert.deepStrictEqual(collect(source), [
			{ argumentNames: [], offset: source.indexOf('inherited') + 9, routineName: 'Inner' },
			{ argumentNames: ['X'], offset: source.lastIndexOf('inherited') + 9, routineName: 'Outer' },
		])
	})

	it('should match the keyword case-insensitively', () => {
		const source = 'procedure TFoo.Run;\nbegin\n  Inherited;\nend;'
		assert.strictEqual(collect(source).length, 1)
	})

	it('should skip routines with parse errors', () => {
		const source = 'procedure TFoo.Run;\nbegin\n  inherited;\n  x := "y";\nend;'
		assert.deepStrictEqual(collect(source), [])
	})
})
