/**
 * Helpers shared by the section transformers.
 */

import { isNoOp, literal, type TextReplacement } from '../replacements/replacement.ts'

const BYTE_ORDER_MARK = '\uFEFF'

/**
 * Offset of the first character of the physical line containing `offset`.
 */
export function findLineStart(source: string, offset: number): number {
	let i = offset
	while (i > 0) {
		const ch = source[i - 1]
		if (ch === '\n' || ch === '\r') break
		i--
	}
	return i
}

/**
 * Anchor a section replacement to its line.
 *
 * - Nothing before the section on its line: keep the start.
 * - Only indentation before it: start at the line start, dropping the indentation.
 * - Other code before it: keep the start and move the section to a new line.
 *
 * A byte-order mark at the start of the file does not count as code.
 */
export function adjustReplacementForLinePosition(
	source: string,
	start: number,
	end: number,
	text: string,
	lineEnding: string,
	final = false
): TextReplacement {
	let lineStart = findLineStart(source, start)
	if (lineStart === 0 && source.startsWith(BYTE_ORDER_MARK)) {
		lineStart = Math.min(BYTE_ORDER_MARK.length, start)
	}

	const prefix = source.slice(lineStart, start)
	if (prefix.length === 0) {
		return literal(start, end, text, final)
	}
	if (/^[ \t]+$/.test(prefix)) {
		return literal(lineStart, end, text, final)
	}
	return literal(start, end, `${lineEnding}${text}`, final)
}

/**
 * The replacement, unless it reproduces the original text.
 */
export function createReplacementIfDifferent(
	source: string,
	replacement: TextReplacement
): TextReplacement | null {
	return isNoOp(source, replacement) ? null : replacement
}
