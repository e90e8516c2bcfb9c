import assert from 'node:assert'
import { describe, it } from 'node:test'
import fc from 'fast-check'
import type { AssemblyFile } from '../../src/model/file.ts'
import { resolve } from '../../src/project/project.ts'
import { parseFiles } from './fixtures.ts'

const symbolName = fc.constantFrom('alpha', 'beta', 'gamma', 'delta')

/** A small file: some globals, some externs, and labels with sub-labels. */
const fileSource = fc
	.record({
		externs: fc.array(symbolName, { maxLength: 3 }),
		globals: fc.array(symbolName, { maxLength: 3 }),
		labels: fc.array(fc.tuple(symbolName, fc.integer({ max: 2, min: 0 })), { maxLength: 3 }),
	})
	.map(({ globals, externs, labels }) =>
		[
			...globals.map((name) => `global ${name}`),
			...externs.map((name) => `extern ${name}`),
			'section .text',
			...labels.flatMap(([name, subLabels]) => [
				`${name}:`,
				...Array.from({ length: subLabels }, (_, index) => `.${name}${index}:`),
			]),
			'',
		].join('\n')
	)

const project = fc.uniqueArray(fc.tuple(fc.constantFrom('a.asm', 'b.asm', 'c.asm', 'd.asm'), fileSource), {
	maxLength: 4,
	selector: ([path]) => path,
})

function reversed(files: Map<string, AssemblyFile>): Map<string, AssemblyFile> {
	return new Map([...files].reverse())
}

describe('project/project properties', () => {
	it('resolves the same tables whatever order files are added in', () => {
		fc.assert(
			fc.property(project, (sources) => {
				const files = parseFiles(sources)
				const forward = resolve(files)
				const backward = resolve(reversed(files))
				assert.deepStrictEqual(backward.globalSources, forward.globalSources)
				assert.deepStrictEqual(backward.internalExterns, forward.internalExterns)
				assert.deepStrictEqual(backward.symbols, forward.symbols)
				assert.deepStrictEqual(backward.symbolConstituents, forward.symbolConstituents)
				assert.deepStrictEqual(backward.collisions, forward.collisions)
			})
		)
	})

	it('resolves every internal extern to a file that declares it global', () => {
		fc.assert(
			fc.property(project, (sources) => {
				const resolved = resolve(parseFiles(sources))
				for (const [name, path] of resolved.internalExterns) {
					assert.ok(resolved.files.get(path)?.globals.has(name))
				}
			})
		)
	})

	it('keeps each global in exactly one file', () => {
		fc.assert(
			fc.property(project, (sources) => {
				const resolved = resolve(parseFiles(sources))
				for (const { name, keptFile, ignoredFile } of resolved.collisions) {
					assert.strictEqual(resolved.globalSources.get(name), keptFile)
					assert.ok(keptFile < ignoredFile)
				}
			})
		)
	})
})
