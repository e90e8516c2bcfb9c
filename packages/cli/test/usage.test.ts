import assert from 'node:assert'
import { describe, it } from 'node:test'
import GenerateCommand from '../src/commands/generate.ts'
import { usageBanner, usageLine } from '../src/usage.ts'

describe('usageLine', () => {
	it('should list the generate arguments and flags', () => {
		assert.strictEqual(
			usageLine('asmdoc', GenerateCommand),
			'asmdoc generate [paths...] [-o, --output <output>] [--keep-going]'
		)
	})
})

describe('usageBanner', () => {
	it('should describe each command', () => {
		assert.deepStrictEqual(usageBanner('asmdoc', '1.2.3', [GenerateCommand]), [
			'asmdoc v1.2.3',
			'',
			'Usage:',
			'  asmdoc generate [paths...] [-o, --output <output>] [--keep-going]',
			'',
			'  generate  Generate Markdown documentation for NASM sources',
			'',
			'Run "asmdoc --help" for every command and option.',
		])
	})
})
