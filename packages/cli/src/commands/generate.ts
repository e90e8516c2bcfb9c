import { mkdir, stat, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import {
	type AssemblyProject,
	buildProject,
	formatParseError,
	MarkdownBackend,
	type SourceInput,
} from '@asmdoc/core'
import {
	ASMCLI001,
	ASMCLI004,
	ASMCLI005,
	ASMCLI007,
	ASMDOC001,
	ASMPROJ050,
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	formatDiagnosticLine,
} from '@asmdoc/diagnostics'
import {
	buildFileMap,
	discoverFiles,
	formatReadError,
	formatWriteError,
	isNodeError,
	readSource,
	unmappedReferences,
} from '../utils.ts'

export default class GenerateCommand extends BaseCommand {
	static override commandName = 'generate'
	static override description = 'Generate Markdown documentation for NASM sources'

	@args.spread({
		description: 'Assembly files or directories to document (default: current directory)',
		required: false,
	})
	declare paths?: string[]

	@flags.string({ alias: 'o', default: 'docs', description: 'Output directory (created if not exists)' })
	declare output: string

	@flags.boolean({ description: 'Document the files that parse even if others fail' })
	declare keepGoing: boolean

	private fail(message: string): void {
		this.logger.error(message)
		this.exitCode = 1
	}

	/** Log a catalog diagnostic; anything above a warning fails the run. */
	private report(def: DiagnosticDef, values?: DiagnosticArgs): void {
		const line = formatDiagnosticLine(def, values)
		if (def.severity === DiagnosticSeverity.Warning) {
			this.logger.warning(line)
		} else {
			this.fail(line)
		}
	}

	private async checkOutputDirectory(): Promise<boolean> {
		try {
			const info = await stat(this.output)
			if (!info.isDirectory()) {
				this.report(ASMCLI004, { path: this.output })
				return false
			}
			return true
		} catch (error: unknown) {
			if (isNodeError(error) && error.code === 'ENOENT') return true
			this.fail(formatWriteError(this.output, error))
			return false
		}
	}

	private async findSources(): Promise<string[] | null> {
		const inputs = this.paths !== undefined && this.paths.length > 0 ? this.paths : ['.']
		const { files, missing } = await discoverFiles(inputs)
		for (const path of missing) {
			this.report(ASMCLI001, { path })
		}
		if (missing.length > 0) return null
		if (files.length === 0) {
			this.report(ASMCLI005)
			return null
		}
		return files
	}

	private async readSources(files: readonly string[]): Promise<SourceInput[] | null> {
		const results = await Promise.all(
			files.map(async (path): Promise<SourceInput | null> => {
				try {
					return { path, source: await readSource(path) }
				} catch (error: unknown) {
					this.fail(formatReadError(path, error))
					return null
				}
			})
		)
		const inputs = results.filter((input): input is SourceInput => input !== null)
		return inputs.length === results.length ? inputs : null
	}

	private parseSources(inputs: readonly SourceInput[]): AssemblyProject | null {
		const { project, failures } = buildProject(inputs)
		for (const failure of failures) {
			this.logger.error(formatParseError(failure.error, failure.source))
		}
		if (failures.length > 0) {
			this.exitCode = 1
			if (!this.keepGoing) {
				this.report(ASMCLI007, { count: failures.length })
				return null
			}
		}
		for (const collision of project.collisions) {
			this.report(ASMPROJ050, {
				ignored: collision.ignoredFile,
				kept: collision.keptFile,
				name: collision.name,
			})
		}
		return project
	}

	private async writeDocs(project: AssemblyProject): Promise<number> {
		const backend = new MarkdownBackend()
		const mapped = buildFileMap(project.paths(), backend.extension)
		if (!mapped.ok) {
			this.fail(mapped.message)
			return 0
		}

		const docs = project.generateDocs()
		const unmapped = unmappedReferences(docs, mapped.fileMap)
		for (const path of unmapped) {
			this.report(ASMDOC001, { path })
		}
		if (unmapped.length > 0) return 0

		const rendered = docs.map(([path, doc]): [string, string] => [path, backend.render(doc, mapped.fileMap)])

		try {
			await mkdir(this.output, { recursive: true })
		} catch (error: unknown) {
			this.fail(formatWriteError(this.output, error))
			return 0
		}

		let written = 0
		for (const [path, content] of rendered) {
			const outputPath = join(this.output, mapped.fileMap.get(path) ?? '')
			try {
				await writeFile(outputPath, content)
				written++
			} catch (error: unknown) {
				this.fail(formatWriteError(outputPath, error))
			}
		}
		return written
	}

	override async run(): Promise<void> {
		if (!(await this.checkOutputDirectory())) return

		const files = await this.findSources()
		if (files === null) return

		const inputs = await this.readSources(files)
		if (inputs === null) return

		const project = this.parseSources(inputs)
		if (project === null) return

		const written = await this.writeDocs(project)
		if (written > 0) {
			this.logger.success(`Wrote ${written} document(s) to ${this.output}`)
		}
	}
}
