import { args, BaseCommand } from '@adonisjs/ace'
import { formatDiagnosticLine, PFCLI006 } from '@pasfix/diagnostics'
import { CONFIG_FILE_NAME } from '../config/config.ts'
import { writeDefaultConfig } from '../config/loader.ts'
import { formatWriteError, isNodeError } from '../utils.ts'

export default class InitConfigCommand extends BaseCommand {
	static override commandName = 'init-config'
	static override description = 'Write a pasfix.toml with every setting at its default'

	@args.string({ default: CONFIG_FILE_NAME, description: 'Where to write the file', required: false })
	declare destination: string

	override async run(): Promise<void> {
		try {
			await writeDefaultConfig(this.destination)
		} catch (error: unknown) {
			this.logger.error(
				isNodeError(error) && error.code === 'EEXIST'
					? formatDiagnosticLine(PFCLI006, { path: this.destination })
					: formatWriteError(error)
			)
			this.exitCode = 1
			return
		}
		this.logger.success(`wrote ${this.destination}`)
	}
}
