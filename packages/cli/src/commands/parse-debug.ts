import { collectInheritedExpansions, extractCodeSections, type SyntaxTree } from '@pasfix/formatter'
import { describeSections } from '../debug.ts'
import ParseCommand from './parse.ts'

export default class ParseDebugCommand extends ParseCommand {
	static override commandName = 'parse-debug'
	static override description = 'Print the sections and inherited calls the formatter would work on'

	protected override render(tree: SyntaxTree): string {
		const { root, source } = tree
		return describeSections(source, extractCodeSections(root), collectInheritedExpansions(root, source))
	}
}
