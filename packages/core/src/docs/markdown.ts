import { basename } from 'node:path'
import { ASMDOC001, interpolateMessage } from '../core/diagnostics.ts'
import type { DocsBackend, FileMap } from './backend.ts'
import { type DocNode, isEmptyDoc } from './nodes.ts'

export const GENERATED_NOTICE = '<!-- This file was generated by asmdoc. -->'

/**
 * Thrown when a document links to a file missing from the file map.
 */
export class RenderError extends Error {
	readonly path: string

	constructor(path: string) {
		super(`[${ASMDOC001.code}] ${interpolateMessage(ASMDOC001.message, { path })}`)
		this.name = 'RenderError'
		this.path = path
	}
}

/**
 * Markdown backend: one heading per file, a table of symbols, and bullet
 * lists of defines and macros.
 */
export class MarkdownBackend implements DocsBackend {
	readonly extension = 'md'

	render(doc: DocNode, fileMap: FileMap): string {
		const out: string[] = []
		this.write(doc, out, fileMap)
		return out.join('')
	}

	private write(doc: DocNode, out: string[], fileMap: FileMap): void {
		switch (doc.kind) {
			case 'file':
				this.writeFile(doc, out, fileMap)
				return
			case 'paragraphs':
				for (const item of doc.items) {
					out.push('- ')
					this.write(item, out, fileMap)
					out.push('\n\n')
				}
				return
			case 'list':
				for (const item of doc.items) {
					out.push('- ')
					this.write(item, out, fileMap)
					out.push('\n')
				}
				return
			case 'table':
				this.writeTable(doc.header, doc.rows, out, fileMap)
				return
			case 'macro':
				out.push(`\`${doc.name}\` (${doc.argCount} argument${doc.argCount === 1 ? '' : 's'})`)
				return
			case 'define':
				out.push(`\`${doc.name}\``)
				return
			case 'inline-code':
				out.push(`\`${doc.code}\``)
				return
			case 'text':
				out.push(doc.text)
				return
			case 'cell-lines':
				doc.lines.forEach((line, index) => {
					if (index > 0) out.push('<br>')
					this.write(line, out, fileMap)
				})
				return
			case 'resolve-file': {
				const target = fileMap.get(doc.path)
				if (target === undefined) {
					throw new RenderError(doc.path)
				}
				out.push(`[${basename(doc.path)}](${target})`)
				return
			}
			case 'concat':
				for (const item of doc.items) this.write(item, out, fileMap)
				return
		}
	}

	private writeFile(
		doc: Extract<DocNode, { kind: 'file' }>,
		out: string[],
		fileMap: FileMap
	): void {
		out.push(`${GENERATED_NOTICE}\n`, `# ${basename(doc.path)}\n\n`)
		const parts: Array<[string, DocNode]> = [
			['Symbols', doc.symbols],
			['Defines', doc.defines],
			['Macros', doc.macros],
		]
		for (const [heading, part] of parts) {
			if (isEmptyDoc(part)) continue
			out.push(`## ${heading}\n`)
			this.write(part, out, fileMap)
			out.push('\n')
		}
	}

	private renderCell(cell: DocNode, fileMap: FileMap): string {
		const out: string[] = []
		this.write(cell, out, fileMap)
		return out.join('')
	}

	private writeTable(
		header: readonly DocNode[],
		rows: readonly (readonly DocNode[])[],
		out: string[],
		fileMap: FileMap
	): void {
		const line = (cells: readonly string[]): string => `| ${cells.join(' | ')} |\n`
		out.push('\n', line(header.map((cell) => this.renderCell(cell, fileMap))))
		out.push(line(header.map(() => '---')))
		for (const row of rows) {
			out.push(line(row.map((cell) => this.renderCell(cell, fileMap))))
		}
	}
}
