import assert from 'node:assert'
import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, it } from 'node:test'
import { Kernel } from '@adonisjs/ace'
import GenerateCommand from '../../src/commands/generate.ts'

const LIBRARY = 'global foo\nsection .text\nfoo:\n  ret\n'
const PROGRAM = 'extern foo\nsection .text\nmain:\n  call foo\n'

async function runGenerate(argv: string[]): Promise<GenerateCommand> {
	const kernel = Kernel.create()
	const command = await kernel.create(GenerateCommand, argv)
	command.ui.switchMode('raw')
	await command.exec()
	return command
}

async function exists(path: string): Promise<boolean> {
	try {
		await stat(path)
		return true
	} catch {
		return false
	}
}

describe('generate command', () => {
	let root = ''
	let src = ''
	let out = ''

	beforeEach(async () => {
		root = await mkdtemp(join(tmpdir(), 'asmdoc-generate-'))
		src = join(root, 'src')
		out = join(root, 'docs')
		await mkdir(src)
	})

	afterEach(async () => {
		await rm(root, { force: true, recursive: true })
	})

	it('should write one document per source with cross-file links', async () => {
		await writeFile(join(src, 'a.asm'), LIBRARY)
		await writeFile(join(src, 'b.asm'), PROGRAM)

		const command = await runGenerate(['--output', out, src])

		command.assertSucceeded()
		const b = await readFile(join(out, 'b.md'), 'utf-8')
		assert.ok(b.includes('| external | `foo` |  | [a.asm](a.md) |\n'))
		const a = await readFile(join(out, 'a.md'), 'utf-8')
		assert.ok(a.includes('| global | `foo` | text |  |\n'))
		command.assertLogMatches(/Wrote 2 document\(s\)/)
	})

	it('should refuse an output path that is a file', async () => {
		await writeFile(join(src, 'a.asm'), LIBRARY)
		await writeFile(out, 'occupied')

		const command = await runGenerate(['-o', out, src])

		command.assertFailed()
		command.assertLogMatches(/\[ASMCLI004\] output path is not a directory/)
	})

	it('should report missing inputs', async () => {
		const command = await runGenerate(['-o', out, join(root, 'missing')])

		command.assertFailed()
		command.assertLogMatches(/\[ASMCLI001\] path not found/)
		assert.strictEqual(await exists(out), false)
	})

	it('should fail when no assembly files are found', async () => {
		await writeFile(join(src, 'readme.txt'), 'nothing here')

		const command = await runGenerate(['-o', out, src])

		command.assertFailed()
		command.assertLogMatches(/\[ASMCLI005\] no assembly files found/)
	})

	it('should fail on sources that are not UTF-8', async () => {
		await writeFile(join(src, 'a.asm'), Buffer.from([0xc3, 0x28]))

		const command = await runGenerate(['-o', out, src])

		command.assertFailed()
		command.assertLogMatches(/\[ASMCLI002\] cannot read/)
	})

	it('should write nothing when a file fails to parse', async () => {
		await writeFile(join(src, 'a.asm'), LIBRARY)
		await writeFile(join(src, 'bad.asm'), 'section .bogus\n')

		const command = await runGenerate(['-o', out, src])

		command.assertFailed()
		command.assertLogMatches(/error\[ASMPARSE004\]: invalid syntax/)
		command.assertLogMatches(/\[ASMCLI007\] 1 file\(s\) failed to parse/)
		assert.strictEqual(await exists(out), false)
	})

	it('should document the other files with --keep-going', async () => {
		await writeFile(join(src, 'a.asm'), LIBRARY)
		await writeFile(join(src, 'bad.asm'), 'section .bogus\n')

		const command = await runGenerate(['-o', out, '--keep-going', src])

		assert.strictEqual(command.exitCode, 1)
		assert.strictEqual(await exists(join(out, 'a.md')), true)
		assert.strictEqual(await exists(join(out, 'bad.md')), false)
	})

	it('should warn about globals declared twice', async () => {
		await writeFile(join(src, 'a.asm'), LIBRARY)
		await writeFile(join(src, 'c.asm'), LIBRARY)

		const command = await runGenerate(['-o', out, src])

		command.assertSucceeded()
		command.assertLogMatches(/\[ASMPROJ050\] global `foo` is already declared in .*a\.asm; ignoring the declaration in .*c\.asm/)
	})

	it('should refuse sources that share a document name', async () => {
		await mkdir(join(src, 'x'))
		await mkdir(join(src, 'y'))
		await writeFile(join(src, 'x', 'io.asm'), 'read:\n')
		await writeFile(join(src, 'y', 'io.nasm'), 'write:\n')

		const command = await runGenerate(['-o', out, src])

		command.assertFailed()
		command.assertLogMatches(/\[ASMCLI006\] .* both map to io\.md/)
		assert.strictEqual(await exists(out), false)
	})
})
