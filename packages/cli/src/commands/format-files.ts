import { flags } from '@adonisjs/ace'
import { FormatContext, type FormatResult, formatSource } from '@pasfix/formatter'
import type { PasfixConfig } from '../config/config.ts'
import { ConfigError } from '../config/errors.ts'
import { resolveOptions } from '../config/loader.ts'
import { isExcluded } from '../config/patterns.ts'
import { formatFormatError } from '../utils.ts'
import { SourceCommand } from './source-command.ts'

/**
 * Shared flow of `update` and `check`: expand the input, resolve each file's
 * configuration, format it and hand the result to the subclass.
 */
export abstract class FormatFilesCommand extends SourceCommand {
	@flags.string({ alias: 'c', description: 'Configuration file to use instead of the nearest pasfix.toml' })
	declare config?: string

	@flags.boolean({ description: 'Report skipped and unchanged files' })
	declare verbose: boolean

	protected abstract handleResult(path: string, source: string, result: FormatResult): Promise<void>

	protected verboseInfo(message: string): void {
		if (this.verbose) this.logger.info(message)
	}

	/**
	 * @returns null when an explicit `--config` cannot be read, which stops
	 * the remaining files as well
	 */
	private async loadConfig(path: string): Promise<PasfixConfig | null> {
		try {
			const { config, warnings } = await resolveOptions(path, this.config)
			for (const warning of warnings) {
				this.logger.warning(warning)
			}
			return config
		} catch (error: unknown) {
			if (!(error instanceof ConfigError)) throw error
			this.logger.error(error.message)
			this.exitCode = 1
			return null
		}
	}

	private formatFile(path: string, source: string, config: PasfixConfig): FormatResult | null {
		const context = new FormatContext(source, path)
		try {
			const result = formatSource(source, config.options, context)
			for (const warning of context.getWarnings()) {
				this.logger.warning(context.formatDiagnostic(warning))
			}
			return result
		} catch (error: unknown) {
			this.logger.error(formatFormatError(error))
			this.exitCode = 1
			return null
		}
	}

	/**
	 * @returns false when no further files should be processed
	 */
	private async processFile(path: string): Promise<boolean> {
		const config = await this.loadConfig(path)
		if (config === null) return false

		if (isExcluded(config, path)) {
			this.verboseInfo(`skipping excluded file ${path}`)
			return true
		}

		const source = await this.readSourceFile(path)
		if (source === null) return true

		const result = this.formatFile(path, source, config)
		if (result !== null) {
			await this.handleResult(path, source, result)
		}
		return true
	}

	override async run(): Promise<void> {
		for (const path of await this.collectFiles()) {
			if (!(await this.processFile(path))) return
		}
	}
}
