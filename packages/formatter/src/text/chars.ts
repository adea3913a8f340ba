/**
 * Character classification helpers shared by the scanner.
 */

export function isDigit(ch: string | undefined): boolean {
	return ch !== undefined && ch >= '0' && ch <= '9'
}

export function isHorizontalSpace(ch: string | undefined): boolean {
	return ch === ' ' || ch === '\t'
}

export function isLineBreak(ch: string | undefined): boolean {
	return ch === '\n' || ch === '\r'
}

export function isWhitespace(ch: string | undefined): boolean {
	return isHorizontalSpace(ch) || isLineBreak(ch)
}

export function isWordChar(ch: string | undefined): boolean {
	if (ch === undefined) return false
	return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || isDigit(ch) || ch === '_'
}

export function trimTrailingHorizontalSpace(line: string): string {
	let end = line.length
	while (end > 0 && isHorizontalSpace(line[end - 1])) end--
	return line.slice(0, end)
}
