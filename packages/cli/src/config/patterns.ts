import { basename, dirname, relative, resolve } from 'node:path'
import { minimatch } from 'minimatch'
import type { PasfixConfig } from './config.ts'

/**
 * Directory that patterns in `config` are relative to.
 */
export function configDirectory(config: PasfixConfig): string {
	return config.path === null ? process.cwd() : dirname(resolve(config.path))
}

function toPosix(path: string): string {
	return path.replaceAll('\\', '/')
}

/**
 * Match a file against a config pattern, first by its path relative to
 * `baseDir`, then by its bare file name.
 */
export function matchesPattern(baseDir: string, pattern: string, filePath: string): boolean {
	const normalized = toPosix(pattern)
	const relativePath = toPosix(relative(baseDir, resolve(filePath)))
	return (
		minimatch(relativePath, normalized, { dot: true }) ||
		minimatch(basename(relativePath), normalized, { dot: true })
	)
}

export function isExcluded(config: PasfixConfig, filePath: string): boolean {
	const baseDir = configDirectory(config)
	return config.excludeFiles.some((pattern) => matchesPattern(baseDir, pattern, filePath))
}
