import assert from 'node:assert'
import type { AssemblyFile } from '../../src/model/file.ts'
import { parse } from '../../src/parse/parser.ts'

/**
 * Parse each `[path, source]` pair, failing the test on any parse error.
 */
export function parseFiles(sources: ReadonlyArray<readonly [string, string]>): Map<string, AssemblyFile> {
	const files = new Map<string, AssemblyFile>()
	for (const [path, source] of sources) {
		const result = parse(source, { filename: path })
		if (!result.succeeded) {
			assert.fail(`${path}: ${result.error.message}`)
		}
		files.set(path, result.file)
	}
	return files
}

export const LIBRARY_SOURCE = 'global foo\nsection .text\nfoo:\n  ret\n'

export const PROGRAM_SOURCE = [
	'%define LIMIT 10',
	'%macro $exit 1',
	'  mov rdi, %1',
	'%endmacro',
	'extern foo',
	'section .text',
	'main:',
	'.loop:',
	'  call foo',
	'  jmp .loop',
	'',
].join('\n')
