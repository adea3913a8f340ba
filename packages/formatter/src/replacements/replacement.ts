/**
 * The edit model.
 *
 * A replacement either carries literal text or is an unresolved placeholder
 * whose text is still the original slice, pending a refinement pass.
 */

export type ReplacementText =
	| { readonly kind: 'unresolved' }
	| { readonly kind: 'literal'; readonly text: string }

export interface TextReplacement {
	/** Offset into the original text */
	readonly start: number
	/** Exclusive end offset; equal to `start` for insertions */
	readonly end: number
	readonly text: ReplacementText
	/** Fully normalized text that later passes must not rescan */
	readonly final: boolean
}

/**
 * A range of the original text not covered by any replacement.
 */
export interface SourceSection {
	readonly start: number
	readonly end: number
}

export function literal(start: number, end: number, text: string, final = false): TextReplacement {
	return { end, final, start, text: { kind: 'literal', text } }
}

export function unresolved(start: number, end: number): TextReplacement {
	return { end, final: false, start, text: { kind: 'unresolved' } }
}

/**
 * The text a replacement contributes to the merged output.
 */
export function resolvedText(source: string, replacement: TextReplacement): string {
	switch (replacement.text.kind) {
		case 'literal':
			return replacement.text.text
		case 'unresolved':
			return source.slice(replacement.start, replacement.end)
	}
}

/**
 * True when applying the replacement would leave the text unchanged.
 */
export function isNoOp(source: string, replacement: TextReplacement): boolean {
	return resolvedText(source, replacement) === source.slice(replacement.start, replacement.end)
}

/**
 * Stable sort by start offset.
 */
export function sortReplacements(replacements: readonly TextReplacement[]): TextReplacement[] {
	return [...replacements].sort((a, b) => a.start - b.start)
}
