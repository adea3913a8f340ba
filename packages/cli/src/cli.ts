#!/usr/bin/env -S node --import tsx

import { readFileSync } from 'node:fs'
import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import CheckCommand from './commands/check.ts'
import InitConfigCommand from './commands/init-config.ts'
import ParseCommand from './commands/parse.ts'
import ParseDebugCommand from './commands/parse-debug.ts'
import UpdateCommand from './commands/update.ts'

function readVersion(): string {
	const manifest: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'))
	if (typeof manifest === 'object' && manifest !== null && 'version' in manifest) {
		return String(manifest.version)
	}
	return '0.0.0'
}

const version = readVersion()

async function main(): Promise<void> {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'pasfix')
	kernel.info.set('version', version)

	kernel.defineFlag('help', {
		alias: 'h',
		description: 'Display help information',
		type: 'boolean',
	})

	kernel.defineFlag('version', {
		alias: 'v',
		description: 'Display version number',
		type: 'boolean',
	})

	kernel.addLoader(
		new ListLoader([UpdateCommand, CheckCommand, InitConfigCommand, ParseCommand, ParseDebugCommand, HelpCommand])
	)

	kernel.on('finding:command', async () => {
		console.log(`pasfix v${version}`)
		console.log('')
		console.log('Usage: pasfix [command] [options]')
		console.log('')
		console.log('Run "pasfix --help" for available commands and options.')
		return true
	})

	await kernel.handle(process.argv.slice(2))
	if (kernel.exitCode !== undefined) {
		process.exitCode = kernel.exitCode
	}
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
