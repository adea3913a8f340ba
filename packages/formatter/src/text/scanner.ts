/**
 * Text scanner: a single-pass state machine that normalizes operator spacing
 * and trailing whitespace without touching string literals or comments.
 *
 * States:
 *   Code              - normal source text, operators are rewritten here
 *   StringLiteral     - '...' with '' as an escaped quote
 *   LineComment       - // up to the end of the line
 *   BraceComment      - { ... } (compiler directives included)
 *   ParenStarComment  - (* ... *)
 */

import {
	hasSpaceAfter,
	hasSpaceBefore,
	SpaceOperation,
	type TextChangeOptions,
} from '../options/options.ts'
import {
	isDigit,
	isHorizontalSpace,
	isLineBreak,
	isWhitespace,
	isWordChar,
	trimTrailingHorizontalSpace,
} from './chars.ts'
import { matchOperator, OperatorClass, type OperatorDef } from './operators.ts'

export const ScanMode = {
	BraceComment: 3,
	Code: 0,
	LineComment: 2,
	ParenStarComment: 4,
	StringLiteral: 1,
} as const

export type ScanMode = (typeof ScanMode)[keyof typeof ScanMode]

/**
 * Output collected one physical line at a time, so trailing whitespace can be
 * trimmed when the line ends.
 *
 * `lead` is text already written on the current line by whatever came before
 * this piece. It takes part in spacing decisions but is never rewritten.
 */
class LineWriter {
	private readonly parts: string[] = []
	private line = ''

	constructor(
		private readonly trim: boolean,
		private lead = ''
	) {}

	write(text: string): void {
		this.line += text
	}

	lineBreak(ch: string): void {
		this.parts.push(this.trim ? trimTrailingHorizontalSpace(this.line) : this.line, ch)
		this.line = ''
		this.lead = ''
	}

	/** Last character of the current line that is not a space or tab. */
	lastNonBlank(): string | undefined {
		const trimmed = trimTrailingHorizontalSpace(this.lead + this.line)
		return trimmed.length > 0 ? trimmed[trimmed.length - 1] : undefined
	}

	endsWithSpace(): boolean {
		const text = this.lead + this.line
		return isHorizontalSpace(text[text.length - 1])
	}

	trimTrailing(): void {
		this.line = trimTrailingHorizontalSpace(this.line)
	}

	finish(trimLast: boolean): string {
		this.parts.push(this.trim && trimLast ? trimTrailingHorizontalSpace(this.line) : this.line)
		this.line = ''
		return this.parts.join('')
	}
}

/**
 * Text around the piece being scanned: `before` is output already produced,
 * `after` is the text that follows, not yet rewritten.
 */
export interface ScanContext {
	readonly before: string
	readonly after: string
}

const NO_CONTEXT: ScanContext = { after: '', before: '' }

function currentLine(text: string): string {
	const cut = Math.max(text.lastIndexOf('\n'), text.lastIndexOf('\r'))
	return text.slice(cut + 1)
}

/**
 * Scanner state.
 */
interface ScanState {
	/** The piece with its context on both sides; only `[index, end)` is rewritten. */
	readonly input: string
	readonly end: number
	readonly options: TextChangeOptions
	readonly out: LineWriter
	mode: ScanMode
	index: number
}

function createScanState(input: string, options: TextChangeOptions, context: ScanContext): ScanState {
	return {
		end: context.before.length + input.length,
		index: context.before.length,
		input: context.before + input + context.after,
		mode: ScanMode.Code,
		options,
		out: new LineWriter(options.trimTrailingWhitespace, currentLine(context.before)),
	}
}

// Words after which `+` and `-` can only be signs.
const OPERATOR_KEYWORDS: ReadonlySet<string> = new Set([
	'and',
	'as',
	'begin',
	'case',
	'div',
	'do',
	'downto',
	'else',
	'in',
	'is',
	'mod',
	'not',
	'of',
	'or',
	'repeat',
	'shl',
	'shr',
	'then',
	'to',
	'until',
	'xor',
])

const SIGN_CONTEXT = '([,;:=<>+-*/'

function isSign(op: OperatorDef): boolean {
	return op.operatorClass === OperatorClass.Add || op.operatorClass === OperatorClass.Sub
}

/**
 * `+`/`-` directly after the `e` of a numeric literal such as `1.5e-3`.
 */
function isExponentSign(input: string, start: number, op: OperatorDef): boolean {
	if (!isSign(op)) return false
	const e = input[start - 1]
	if ((e !== 'e' && e !== 'E') || !isDigit(input[start + 1])) return false

	let j = start - 2
	while (j >= 0 && (isDigit(input[j]) || input[j] === '.')) j--
	if (j === start - 2 || !isDigit(input[j + 1])) return false

	const before = input[j]
	return !isWordChar(before) && before !== '$' && before !== '#' && before !== '&' && before !== '%'
}

/**
 * `+`/`-` in prefix position: nothing before it but an opening bracket, a
 * separator, another operator or an operator keyword.
 */
function isUnarySign(input: string, start: number, op: OperatorDef): boolean {
	if (!isSign(op)) return false

	let j = start - 1
	while (j >= 0 && isWhitespace(input[j])) j--
	const prev = input[j]
	if (prev === undefined) return true
	if (SIGN_CONTEXT.includes(prev)) return true
	// Range operator `..`
	if (prev === '.' && input[j - 1] === '.') return true
	if (!isWordChar(prev)) return false

	let k = j
	while (k >= 0 && isWordChar(input[k])) k--
	return OPERATOR_KEYWORDS.has(input.slice(k + 1, j + 1).toLowerCase())
}

function isNumericColon(state: ScanState, start: number, op: OperatorDef): boolean {
	return (
		state.options.colonNumericException &&
		op.operatorClass === OperatorClass.Colon &&
		isDigit(state.input[start - 1]) &&
		isDigit(state.input[start + op.text.length])
	)
}

function spaceBefore(state: ScanState, opChar: string): void {
	const prev = state.out.lastNonBlank()
	// Start of line: keep the indentation as it is.
	if (prev === undefined || prev === opChar) return
	state.out.trimTrailing()
	if (!state.out.endsWithSpace()) state.out.write(' ')
}

function spaceAfter(state: ScanState, op: OperatorDef, unary: boolean): void {
	const { end, input } = state
	const from = state.index
	let k = from
	while (k < end && isHorizontalSpace(input[k])) k++
	state.index = k
	if (unary) return
	// The operator ends the piece: spacing is settled when the next piece starts.
	if (k === end && k < input.length) return

	const next = input[k]
	if (next === undefined || isLineBreak(next) || next === op.text[op.text.length - 1]) {
		state.out.write(input.slice(from, k))
		return
	}
	state.out.write(' ')
}

function applyOperator(state: ScanState, op: OperatorDef): void {
	const start = state.index
	const operation = state.options.spacing[op.operatorClass]
	state.index = start + op.text.length

	if (
		operation === SpaceOperation.NoChange ||
		isNumericColon(state, start, op) ||
		isExponentSign(state.input, start, op)
	) {
		state.out.write(op.text)
		return
	}

	const unary = isUnarySign(state.input, start, op)
	if (hasSpaceBefore(operation) && !unary) {
		spaceBefore(state, op.text[0] ?? '')
	}
	state.out.write(op.text)
	if (hasSpaceAfter(operation)) {
		spaceAfter(state, op, unary)
	}
}

function scanCode(state: ScanState, ch: string): void {
	const next = state.input[state.index + 1]

	if (isLineBreak(ch)) {
		state.out.lineBreak(ch)
		state.index++
		return
	}
	if (ch === "'") {
		state.out.write(ch)
		state.mode = ScanMode.StringLiteral
		state.index++
		return
	}
	if (ch === '{') {
		state.out.write(ch)
		state.mode = ScanMode.BraceComment
		state.index++
		return
	}
	if (ch === '(' && next === '*') {
		state.out.write('(*')
		state.mode = ScanMode.ParenStarComment
		state.index += 2
		return
	}
	if (ch === '/' && next === '/') {
		state.out.write('//')
		state.mode = ScanMode.LineComment
		state.index += 2
		return
	}

	const op = matchOperator(state.input, state.index)
	if (op !== undefined && state.index + op.text.length <= state.end) {
		applyOperator(state, op)
		return
	}

	state.out.write(ch)
	state.index++
}

function scanStringLiteral(state: ScanState, ch: string): void {
	if (isLineBreak(ch)) {
		// Unterminated literal: resume scanning code on the next line.
		state.out.lineBreak(ch)
		state.mode = ScanMode.Code
		state.index++
		return
	}
	if (ch === "'") {
		if (state.input[state.index + 1] === "'") {
			state.out.write("''")
			state.index += 2
			return
		}
		state.mode = ScanMode.Code
	}
	state.out.write(ch)
	state.index++
}

function scanComment(state: ScanState, ch: string): void {
	if (isLineBreak(ch)) {
		state.out.lineBreak(ch)
		if (state.mode === ScanMode.LineComment) {
			state.mode = ScanMode.Code
		}
		state.index++
		return
	}
	if (state.mode === ScanMode.BraceComment && ch === '}') {
		state.mode = ScanMode.Code
	} else if (
		state.mode === ScanMode.ParenStarComment &&
		ch === '*' &&
		state.input[state.index + 1] === ')'
	) {
		state.out.write('*)')
		state.mode = ScanMode.Code
		state.index += 2
		return
	}
	state.out.write(ch)
	state.index++
}

/**
 * Operator written just before the piece, if any.
 */
function pendingOperator(input: string, index: number): OperatorDef | undefined {
	for (const length of [2, 1]) {
		const op = matchOperator(input, index - length)
		if (index - length >= 0 && op?.text.length === length) return op
	}
	return undefined
}

/**
 * Apply the space after an operator that ends the text before the piece.
 */
function settlePendingOperator(state: ScanState): void {
	const op = pendingOperator(state.input, state.index)
	if (op === undefined) return

	const start = state.index - op.text.length
	const operation = state.options.spacing[op.operatorClass]
	if (
		!hasSpaceAfter(operation) ||
		isNumericColon(state, start, op) ||
		isExponentSign(state.input, start, op)
	) {
		return
	}
	spaceAfter(state, op, isUnarySign(state.input, start, op))
}

/**
 * Rewrite `input` according to the text change options.
 *
 * When `input` is one piece of a larger text, `context` gives what surrounds
 * it, so that the piece comes out the way it would inside the whole text.
 */
export function applyTextChanges(
	input: string,
	options: TextChangeOptions,
	context: ScanContext = NO_CONTEXT
): string {
	const state = createScanState(input, options, context)
	if (state.index > 0) settlePendingOperator(state)

	while (state.index < state.end) {
		const ch = state.input[state.index] ?? ''
		switch (state.mode) {
			case ScanMode.Code:
				scanCode(state, ch)
				break
			case ScanMode.StringLiteral:
				scanStringLiteral(state, ch)
				break
			case ScanMode.LineComment:
			case ScanMode.BraceComment:
			case ScanMode.ParenStarComment:
				scanComment(state, ch)
				break
		}
	}

	const following = context.after.replace(/^[ \t]+/, '')
	return state.out.finish(following.length === 0 || isLineBreak(following[0]))
}
