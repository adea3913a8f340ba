/**
 * Source positions.
 *
 * Offsets index the JavaScript string holding the file (UTF-16 code units).
 * Rows and columns are 0-based, columns counted in the same units.
 */

export interface Point {
	readonly row: number
	readonly column: number
}

/**
 * Half-open range `[start, end)` with redundant row/column positions.
 */
export interface Span {
	readonly start: number
	readonly end: number
	readonly startPosition: Point
	readonly endPosition: Point
}

/**
 * Maps offsets to row/column positions.
 * Line starts are computed once; lookups are a binary search.
 */
export class LineIndex {
	private readonly lineStarts: number[] = [0]

	constructor(source: string) {
		for (let i = 0; i < source.length; i++) {
			const ch = source.charCodeAt(i)
			if (ch === 0x0a) {
				this.lineStarts.push(i + 1)
			} else if (ch === 0x0d && source.charCodeAt(i + 1) !== 0x0a) {
				this.lineStarts.push(i + 1)
			}
		}
	}

	positionAt(offset: number): Point {
		let low = 0
		let high = this.lineStarts.length - 1
		while (low < high) {
			const mid = (low + high + 1) >> 1
			const start = this.lineStarts[mid] ?? 0
			if (start <= offset) {
				low = mid
			} else {
				high = mid - 1
			}
		}
		return { column: offset - (this.lineStarts[low] ?? 0), row: low }
	}

	span(start: number, end: number): Span {
		return {
			end,
			endPosition: this.positionAt(end),
			start,
			startPosition: this.positionAt(start),
		}
	}

	lineCount(): number {
		return this.lineStarts.length
	}
}
