/**
 * Project-wide symbol resolution.
 * Links per-file models: globals to their defining files, externs to those
 * definitions, and dotted sub-labels to the label that owns them.
 */

import { generateFileDocs } from '../docs/generate.ts'
import type { DocNode } from '../docs/nodes.ts'
import {
	type AssemblyFile,
	isSubLabel,
	type LabelItem,
	labelsIn,
	type Section,
} from '../model/file.ts'

export const Visibility = {
	External: 'external',
	Global: 'global',
	Private: 'private',
} as const

export type Visibility = (typeof Visibility)[keyof typeof Visibility]

export interface ProjectSymbol {
	readonly visibility: Visibility
	/** Defining section; `null` for externals. */
	readonly section: Section | null
}

/** A global declared by more than one file. The first file in path order keeps it. */
export interface GlobalCollision {
	readonly name: string
	readonly keptFile: string
	readonly ignoredFile: string
}

export interface ResolvedTables {
	/** Global name -> file declaring it */
	readonly globalSources: ReadonlyMap<string, string>
	/** Extern name -> file defining it, for externs defined inside the project */
	readonly internalExterns: ReadonlyMap<string, string>
	/** File -> symbol name -> symbol, in insertion order */
	readonly symbols: ReadonlyMap<string, ReadonlyMap<string, ProjectSymbol>>
	/** Top-level label -> its sub-labels in encounter order */
	readonly symbolConstituents: ReadonlyMap<string, readonly string[]>
	readonly collisions: readonly GlobalCollision[]
}

function sortedPaths(files: ReadonlyMap<string, AssemblyFile>): string[] {
	return [...files.keys()].sort()
}

function collectGlobalSources(
	files: ReadonlyMap<string, AssemblyFile>,
	paths: readonly string[]
): { globalSources: Map<string, string>; collisions: GlobalCollision[] } {
	const globalSources = new Map<string, string>()
	const collisions: GlobalCollision[] = []
	for (const path of paths) {
		for (const name of files.get(path)?.globals ?? []) {
			const keptFile = globalSources.get(name)
			if (keptFile === undefined) {
				globalSources.set(name, path)
			} else {
				collisions.push({ ignoredFile: path, keptFile, name })
			}
		}
	}
	return { collisions, globalSources }
}

function collectInternalExterns(
	files: ReadonlyMap<string, AssemblyFile>,
	paths: readonly string[],
	globalSources: ReadonlyMap<string, string>
): Map<string, string> {
	const internalExterns = new Map<string, string>()
	for (const path of paths) {
		for (const name of files.get(path)?.externs ?? []) {
			const definingFile = globalSources.get(name)
			if (definingFile !== undefined) {
				internalExterns.set(name, definingFile)
			}
		}
	}
	return internalExterns
}

function appendConstituent(
	constituents: Map<string, string[]>,
	owner: string,
	subLabel: string
): void {
	const list = constituents.get(owner)
	if (list === undefined) {
		constituents.set(owner, [subLabel])
	} else {
		list.push(subLabel)
	}
}

/**
 * Build one file's symbol table. The current top-level label is a fold
 * accumulator over the file's labels, so it never leaks between files.
 */
function collectFileSymbols(
	file: AssemblyFile,
	constituents: Map<string, string[]>
): Map<string, ProjectSymbol> {
	const table = new Map<string, ProjectSymbol>()
	for (const name of file.externs) {
		table.set(name, { section: null, visibility: Visibility.External })
	}

	const labels: Array<{ label: LabelItem; section: Section }> = [...file.sections].flatMap(
		([section, items]) => labelsIn(items).map((label) => ({ label, section }))
	)

	labels.reduce<string | null>((owner, { label, section }) => {
		if (isSubLabel(label.name) && owner !== null) {
			appendConstituent(constituents, owner, label.name)
			return owner
		}
		table.set(label.name, {
			section,
			visibility: file.globals.has(label.name) ? Visibility.Global : Visibility.Private,
		})
		// Dotted labels normally stay out of the table and are listed under their
		// owner. An orphan has no owner, so it gets its own row rather than being
		// dropped from the docs; it never becomes the owner of later sub-labels.
		return isSubLabel(label.name) ? owner : label.name
	}, null)

	return table
}

/**
 * Compute every resolved table. Pure and total: unresolved externs are simply
 * absent from `internalExterns`.
 */
export function resolveTables(files: ReadonlyMap<string, AssemblyFile>): ResolvedTables {
	const paths = sortedPaths(files)
	const { globalSources, collisions } = collectGlobalSources(files, paths)
	const internalExterns = collectInternalExterns(files, paths, globalSources)

	const symbolConstituents = new Map<string, string[]>()
	const symbols = new Map<string, ReadonlyMap<string, ProjectSymbol>>()
	for (const path of paths) {
		const file = files.get(path)
		if (file !== undefined) {
			symbols.set(path, collectFileSymbols(file, symbolConstituents))
		}
	}

	return { collisions, globalSources, internalExterns, symbolConstituents, symbols }
}

/**
 * A resolved assembly project. Built once from a fixed set of file models.
 */
export class AssemblyProject implements ResolvedTables {
	readonly files: ReadonlyMap<string, AssemblyFile>
	readonly globalSources: ReadonlyMap<string, string>
	readonly internalExterns: ReadonlyMap<string, string>
	readonly symbols: ReadonlyMap<string, ReadonlyMap<string, ProjectSymbol>>
	readonly symbolConstituents: ReadonlyMap<string, readonly string[]>
	readonly collisions: readonly GlobalCollision[]

	private constructor(files: ReadonlyMap<string, AssemblyFile>, tables: ResolvedTables) {
		this.files = files
		this.globalSources = tables.globalSources
		this.internalExterns = tables.internalExterns
		this.symbols = tables.symbols
		this.symbolConstituents = tables.symbolConstituents
		this.collisions = tables.collisions
	}

	static buildFrom(files: ReadonlyMap<string, AssemblyFile>): AssemblyProject {
		const owned = new Map(files)
		return new AssemblyProject(owned, resolveTables(owned))
	}

	/** File paths in resolution order. */
	paths(): string[] {
		return sortedPaths(this.files)
	}

	/** One document tree per file, in path order. */
	generateDocs(): Array<[string, DocNode]> {
		return this.paths().map((path): [string, DocNode] => [path, generateFileDocs(this, path)])
	}
}

/**
 * Resolve a set of parsed files into a project.
 */
export function resolve(files: ReadonlyMap<string, AssemblyFile>): AssemblyProject {
	return AssemblyProject.buildFrom(files)
}
