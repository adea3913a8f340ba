import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { formatDiagnosticLine, PFCLI004 } from '@pasfix/diagnostics'
import { expandInputs } from '../files.ts'
import { formatReadError } from '../utils.ts'

/**
 * Base for commands that take a Pascal source file, or with `--multi` a glob
 * pattern, as their first argument.
 */
export abstract class SourceCommand extends BaseCommand {
	@args.string({ description: 'Pascal source file' })
	declare file: string

	@flags.boolean({ alias: 'm', description: 'Treat <file> as a glob pattern' })
	declare multi: boolean

	protected async collectFiles(): Promise<string[]> {
		const files = await expandInputs(this.file, this.multi)
		if (files.length === 0) {
			this.logger.error(formatDiagnosticLine(PFCLI004, { pattern: this.file }))
			this.exitCode = 1
		}
		return files
	}

	protected async readSourceFile(path: string): Promise<string | null> {
		try {
			return await readFile(path, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(path, error))
			this.exitCode = 1
			return null
		}
	}
}
