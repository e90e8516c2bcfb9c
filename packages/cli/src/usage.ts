import type { BaseCommand } from '@adonisjs/ace'

type CommandClass = typeof BaseCommand
type CommandFlag = CommandClass['flags'][number]
type CommandArgument = CommandClass['args'][number]

function formatArgument(argument: CommandArgument): string {
	const name = argument.type === 'spread' ? `${argument.argumentName}...` : argument.argumentName
	return argument.required === false ? `[${name}]` : `<${name}>`
}

function formatFlag(flag: CommandFlag): string {
	const aliases = flag.alias === undefined ? [] : [flag.alias].flat()
	const names = [...aliases.map((alias) => `-${alias}`), `--${flag.flagName}`].join(', ')
	return flag.type === 'boolean' ? `[${names}]` : `[${names} <${flag.name}>]`
}

/**
 * One usage line derived from a command's declared arguments and flags, e.g.
 * `asmdoc generate [paths...] [-o, --output <output>] [--keep-going]`.
 */
export function usageLine(binary: string, command: CommandClass): string {
	return [
		binary,
		command.commandName,
		...command.args.map(formatArgument),
		...command.flags.map(formatFlag),
	].join(' ')
}

/**
 * Banner shown when asmdoc runs without a command.
 */
export function usageBanner(binary: string, version: string, commands: readonly CommandClass[]): string[] {
	return [
		`${binary} v${version}`,
		'',
		'Usage:',
		...commands.map((command) => `  ${usageLine(binary, command)}`),
		'',
		...commands.map((command) => `  ${command.commandName}  ${command.description}`),
		'',
		`Run "${binary} --help" for every command and option.`,
	]
}
