import { writeFile } from 'node:fs/promises'
import type { FormatResult } from '@pasfix/formatter'
import { formatWriteError } from '../utils.ts'
import { FormatFilesCommand } from './format-files.ts'

export default class UpdateCommand extends FormatFilesCommand {
	static override commandName = 'update'
	static override description = 'Format Pascal source files in place'

	protected override async handleResult(path: string, _source: string, result: FormatResult): Promise<void> {
		if (result.replacements.length === 0) {
			this.verboseInfo(`unchanged ${path}`)
			return
		}

		try {
			await writeFile(path, result.text, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatWriteError(error))
			this.exitCode = 1
			return
		}
		this.verboseInfo(`formatted ${path}`)
	}
}
