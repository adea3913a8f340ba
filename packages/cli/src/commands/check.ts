import type { FormatResult } from '@pasfix/formatter'
import { formatReplacementReport } from '../report.ts'
import { FormatFilesCommand } from './format-files.ts'

export default class CheckCommand extends FormatFilesCommand {
	static override commandName = 'check'
	static override description = 'Show the changes update would make, without writing them'

	protected override async handleResult(path: string, source: string, result: FormatResult): Promise<void> {
		if (result.replacements.length === 0) {
			this.verboseInfo(`unchanged ${path}`)
			return
		}

		this.logger.log(path)
		this.logger.log(formatReplacementReport(source, result.replacements))
		this.exitCode = 1
	}
}
