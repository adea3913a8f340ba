import assert from 'node:assert'
import { describe, it } from 'node:test'
import { literal } from '@pasfix/formatter'
import { formatReplacementReport, splitLines } from '../src/report.ts'

describe('report', () => {
	describe('splitLines', () => {
		it('should split on every line break style', () => {
			assert.deepStrictEqual(splitLines('a\r\nb\nc\rd'), ['a', 'b', 'c', 'd'])
		})

		it('should not add an entry after a trailing line break', () => {
			assert.deepStrictEqual(splitLines('a\n'), ['a'])
		})

		it('should return nothing for empty text', () => {
			assert.deepStrictEqual(splitLines(''), [])
		})
	})

	describe('formatReplacementReport', () => {
		it('should show original and new lines', () => {
			const report = formatReplacementReport('uses B, A;', [literal(0, 10, 'uses\n  A,\n  B;')])
			assert.strictEqual(report, 'Replacement 1: Location 1:1-1:11\n- uses B, A;\n+ uses\n+   A,\n+   B;')
		})

		it('should show only new lines for insertions', () => {
			const report = formatReplacementReport('procedure Foo;', [literal(13, 13, '()')])
			assert.strictEqual(report, 'Replacement 1: Location 1:14-1:14\n+ ()')
		})

		it('should number blocks and separate them with a blank line', () => {
			const source = 'a,b;\nc,d;'
			const report = formatReplacementReport(source, [literal(0, 4, 'a, b;'), literal(5, 9, 'c, d;')])
			assert.strictEqual(
				report,
				[
					'Replacement 1: Location 1:1-1:5',
					'- a,b;',
					'+ a, b;',
					'',
					'Replacement 2: Location 2:1-2:5',
					'- c,d;',
					'+ c, d;',
				].join('\n')
			)
		})
	})
})
