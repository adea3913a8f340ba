import { describe, it } from 'node:test'
import fc from 'fast-check'
import { computeSourceSections, mergeReplacements } from '../../src/replacements/merge.ts'
import { literal, type TextReplacement, unresolved } from '../../src/replacements/replacement.ts'

// Text with non-overlapping replacements built from sorted cut points
const textWithReplacementsArb = fc
	.string({ maxLength: 60 })
	.chain((text) =>
		fc
			.array(fc.integer({ max: text.length, min: 0 }), { maxLength: 10 })
			.map((cuts): [string, TextReplacement[]] => {
				const sorted = [...cuts].sort((a, b) => a - b)
				const replacements: TextReplacement[] = []
				for (let i = 0; i + 1 < sorted.length; i += 2) {
					const start = sorted[i] ?? 0
					const end = sorted[i + 1] ?? start
					replacements.push(literal(start, end, `<${i}>`))
				}
				return [text, replacements]
			})
	)

describe('replacements/merge properties', () => {
	it('gaps and replacement ranges tile the whole text', () => {
		fc.assert(
			fc.property(textWithReplacementsArb, ([text, replacements]) => {
				const ranges = [
					...computeSourceSections(text, replacements),
					...replacements.filter((r) => r.start < r.end),
				].sort((a, b) => a.start - b.start)

				let position = 0
				for (const range of ranges) {
					if (range.start !== position) return false
					position = range.end
				}
				return position === text.length
			}),
			{ numRuns: 500 }
		)
	})

	it('gaps are never empty', () => {
		fc.assert(
			fc.property(textWithReplacementsArb, ([text, replacements]) =>
				computeSourceSections(text, replacements).every((gap) => gap.start < gap.end)
			),
			{ numRuns: 500 }
		)
	})

	it('merging placeholders for every gap reproduces the text', () => {
		fc.assert(
			fc.property(fc.string({ maxLength: 60 }), (text) => {
				const gaps = computeSourceSections(text, []).map((gap) => unresolved(gap.start, gap.end))
				return mergeReplacements(text, gaps) === text
			}),
			{ numRuns: 500 }
		)
	})

	it('merged length accounts for every replacement', () => {
		fc.assert(
			fc.property(textWithReplacementsArb, ([text, replacements]) => {
				const delta = replacements.reduce(
					(sum, r) => sum + (r.text.kind === 'literal' ? r.text.text.length : 0) - (r.end - r.start),
					0
				)
				return mergeReplacements(text, replacements).length === text.length + delta
			}),
			{ numRuns: 500 }
		)
	})
})
