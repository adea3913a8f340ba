/**
 * Typed access to an untrusted TOML table.
 *
 * Every accessor returns the fallback when the key is missing. A value of the
 * wrong type also returns the fallback and records a PFCFG002 warning.
 */

import { formatDiagnosticLine, PFCFG002 } from '@pasfix/diagnostics'

export type Table = Readonly<Record<string, unknown>>

export function isTable(value: unknown): value is Table {
	return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
}

function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

function isStringPair(value: unknown): value is [string, string] {
	return isStringArray(value) && value.length === 2
}

export class FieldReader {
	constructor(
		private readonly values: Table,
		private readonly warnings: string[],
		private readonly prefix = ''
	) {}

	private keyName(key: string): string {
		return this.prefix === '' ? key : `${this.prefix}.${key}`
	}

	private invalid<T>(key: string, expected: string, fallback: T): T {
		this.warnings.push(formatDiagnosticLine(PFCFG002, { expected, key: this.keyName(key) }))
		return fallback
	}

	string(key: string, fallback: string): string {
		const value = this.values[key]
		if (value === undefined) return fallback
		return typeof value === 'string' ? value : this.invalid(key, 'a string', fallback)
	}

	boolean(key: string, fallback: boolean): boolean {
		const value = this.values[key]
		if (value === undefined) return fallback
		return typeof value === 'boolean' ? value : this.invalid(key, 'true or false', fallback)
	}

	stringArray(key: string, fallback: readonly string[]): readonly string[] {
		const value = this.values[key]
		if (value === undefined) return fallback
		return isStringArray(value) ? value : this.invalid(key, 'an array of strings', fallback)
	}

	oneOf<T extends string>(key: string, allowed: readonly T[], fallback: T): T {
		const value = this.values[key]
		if (value === undefined) return fallback
		const match = allowed.find((candidate) => candidate === value)
		return match ?? this.invalid(key, `one of ${allowed.join(', ')}`, fallback)
	}

	pairs(key: string): [string, string][] {
		const value = this.values[key]
		if (value === undefined) return []
		if (Array.isArray(value) && value.every(isStringPair)) {
			return value.map(([first, second]): [string, string] => [first, second])
		}
		return this.invalid(key, 'an array of [pattern, config] pairs', [])
	}

	/**
	 * Reader for a nested table; a missing table reads as empty.
	 */
	table(key: string): FieldReader {
		const value = this.values[key]
		if (value === undefined) return new FieldReader({}, this.warnings, this.keyName(key))
		if (isTable(value)) return new FieldReader(value, this.warnings, this.keyName(key))
		return this.invalid(key, 'a table', new FieldReader({}, this.warnings, this.keyName(key)))
	}
}
