import { glob } from 'glob'

/**
 * Files named by a command's `<file>` argument.
 *
 * Without `multi` the argument is taken literally. With it, the argument is
 * a glob pattern; matches are returned in sorted order.
 */
export async function expandInputs(input: string, multi: boolean): Promise<string[]> {
	if (!multi) return [input]
	const matches = await glob(input, { nodir: true })
	return matches.sort()
}
