/**
 * Finding and reading `pasfix.toml` files.
 */

import { access, readFile, writeFile } from 'node:fs/promises'
import { dirname, join, resolve } from 'node:path'
import { formatDiagnosticLine, PFCFG001 } from '@pasfix/diagnostics'
import { stringify } from 'smol-toml'
import { formatReadError, getErrorMessage } from '../utils.ts'
import {
	CONFIG_FILE_NAME,
	defaultConfig,
	defaultConfigDocument,
	type LoadedConfig,
	type PasfixConfig,
	parseConfig,
} from './config.ts'
import { ConfigError } from './errors.ts'
import { configDirectory, matchesPattern } from './patterns.ts'

async function exists(path: string): Promise<boolean> {
	try {
		await access(path)
		return true
	} catch {
		return false
	}
}

/**
 * Read and parse a configuration file.
 *
 * @throws {ConfigError} If the file cannot be read
 */
export async function loadConfig(path: string): Promise<LoadedConfig> {
	let text: string
	try {
		text = await readFile(path, 'utf-8')
	} catch (error: unknown) {
		throw new ConfigError(formatReadError(path, error), path)
	}
	return parseConfig(text, path)
}

/**
 * Like `loadConfig`, but an unreadable file becomes a warning and the defaults.
 */
async function loadConfigOrDefaults(path: string): Promise<LoadedConfig> {
	try {
		return await loadConfig(path)
	} catch (error: unknown) {
		const reason = getErrorMessage(error)
		return {
			config: { ...defaultConfig(), path },
			warnings: [formatDiagnosticLine(PFCFG001, { path, reason })],
		}
	}
}

/**
 * Nearest `pasfix.toml` in the file's directory or any parent directory.
 */
export async function discoverConfig(filePath: string): Promise<string | null> {
	let directory = dirname(resolve(filePath))
	for (;;) {
		const candidate = join(directory, CONFIG_FILE_NAME)
		if (await exists(candidate)) return candidate

		const parent = dirname(directory)
		if (parent === directory) return null
		directory = parent
	}
}

function findCustomConfig(config: PasfixConfig, filePath: string): string | null {
	const baseDir = configDirectory(config)
	const match = config.customConfigPatterns.find(({ pattern }) => matchesPattern(baseDir, pattern, filePath))
	return match === undefined ? null : resolve(baseDir, match.configPath)
}

/**
 * Configuration that applies to `filePath`.
 *
 * Uses `explicitConfig` when given, otherwise the discovered file, otherwise
 * the defaults. A matching `custom_config_patterns` entry then replaces it
 * with the configuration it names.
 *
 * @throws {ConfigError} If `explicitConfig` cannot be read
 */
export async function resolveOptions(filePath: string, explicitConfig?: string): Promise<LoadedConfig> {
	let base: LoadedConfig
	if (explicitConfig !== undefined) {
		base = await loadConfig(explicitConfig)
	} else {
		const discovered = await discoverConfig(filePath)
		base = discovered === null ? { config: defaultConfig(), warnings: [] } : await loadConfigOrDefaults(discovered)
	}

	const customPath = findCustomConfig(base.config, filePath)
	if (customPath === null) return base

	const custom = await loadConfigOrDefaults(customPath)
	return { config: custom.config, warnings: [...base.warnings, ...custom.warnings] }
}

/**
 * Write every setting at its default. Never overwrites an existing file.
 */
export async function writeDefaultConfig(path: string): Promise<void> {
	await writeFile(path, stringify(defaultConfigDocument()), { encoding: 'utf-8', flag: 'wx' })
}
