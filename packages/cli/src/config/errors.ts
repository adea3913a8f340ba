/**
 * Raised when a configuration file named on the command line cannot be read.
 * Problems inside a readable file only produce warnings.
 */
export class ConfigError extends Error {
	readonly path: string

	constructor(message: string, path: string) {
		super(message)
		this.name = 'ConfigError'
		this.path = path
	}
}
