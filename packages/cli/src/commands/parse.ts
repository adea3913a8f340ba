import { formatDiagnosticLine, PFPARSE001 } from '@pasfix/diagnostics'
import { parse, printTree, type SyntaxTree } from '@pasfix/formatter'
import { SourceCommand } from './source-command.ts'

export default class ParseCommand extends SourceCommand {
	static override commandName = 'parse'
	static override description = 'Print the outline syntax tree of a Pascal source file'

	private parseSource(source: string): SyntaxTree | null {
		const result = parse(source)
		if (!result.succeeded || result.tree === undefined) {
			this.logger.error(formatDiagnosticLine(PFPARSE001, { reason: result.message ?? 'unexpected input' }))
			this.exitCode = 1
			return null
		}
		return result.tree
	}

	protected render(tree: SyntaxTree): string {
		return printTree(tree.root)
	}

	override async run(): Promise<void> {
		for (const path of await this.collectFiles()) {
			const source = await this.readSourceFile(path)
			if (source === null) continue

			const tree = this.parseSource(source)
			if (tree === null) continue

			if (this.multi) this.logger.log(`${path}:`)
			this.logger.log(this.render(tree))
		}
	}
}
