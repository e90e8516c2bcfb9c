#!/usr/bin/env -S node --import tsx

import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import GenerateCommand from './commands/generate.ts'
import { usageBanner } from './usage.ts'

const BINARY = 'asmdoc'
const VERSION = '0.1.0'
const COMMANDS = [GenerateCommand] as const

const kernel = Kernel.create()
kernel.info.set('binary', BINARY)
kernel.info.set('version', VERSION)

kernel.defineFlag('help', { alias: 'h', description: 'Display help information', type: 'boolean' })
kernel.defineFlag('version', { alias: 'v', description: 'Display version number', type: 'boolean' })

kernel.addLoader(new ListLoader([...COMMANDS, HelpCommand]))

// `asmdoc` alone prints usage for the documentation commands and exits.
kernel.on('finding:command', async (): Promise<boolean> => {
	for (const line of usageBanner(BINARY, VERSION, COMMANDS)) {
		console.log(line)
	}
	return true
})

try {
	await kernel.handle(process.argv.slice(2))
	process.exitCode = kernel.exitCode
} catch (error: unknown) {
	console.error(error)
	process.exitCode = 1
}
