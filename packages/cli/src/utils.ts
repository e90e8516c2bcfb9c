import type { Dirent } from 'node:fs'
import { readdir, readFile, stat } from 'node:fs/promises'
import { basename, extname, join, normalize } from 'node:path'
import { type DocNode, type FileMap, referencedFiles } from '@asmdoc/core'
import {
	ASMCLI001,
	ASMCLI002,
	ASMCLI003,
	ASMCLI006,
	formatDiagnosticLine,
} from '@asmdoc/diagnostics'

const ASSEMBLY_EXTENSIONS: ReadonlySet<string> = new Set(['.asm', '.nasm'])

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatDiagnosticLine(ASMCLI001, { path: filePath })
	}
	return formatDiagnosticLine(ASMCLI002, { path: filePath, reason: getErrorMessage(error) })
}

export function formatWriteError(filePath: string, error: unknown): string {
	return formatDiagnosticLine(ASMCLI003, { path: filePath, reason: getErrorMessage(error) })
}

export function isAssemblyPath(filePath: string): boolean {
	return ASSEMBLY_EXTENSIONS.has(extname(filePath).toLowerCase())
}

/** `src/boot.asm` -> `boot.md` */
export function outputNameFor(sourcePath: string, extension: string): string {
	return `${basename(sourcePath, extname(sourcePath))}.${extension}`
}

export type FileMapResult =
	| { readonly ok: true; readonly fileMap: ReadonlyMap<string, string> }
	| { readonly ok: false; readonly message: string }

/**
 * Map every source to its document name. All documents share one directory,
 * so two sources with the same base name cannot both be written.
 */
export function buildFileMap(paths: readonly string[], extension: string): FileMapResult {
	const fileMap = new Map<string, string>()
	const owners = new Map<string, string>()
	for (const path of paths) {
		const output = outputNameFor(path, extension)
		const first = owners.get(output)
		if (first !== undefined) {
			return {
				message: formatDiagnosticLine(ASMCLI006, { first, output, second: path }),
				ok: false,
			}
		}
		owners.set(output, path)
		fileMap.set(path, output)
	}
	return { fileMap, ok: true }
}

/**
 * Source paths that documents link to but that have no entry in `fileMap`,
 * sorted and without duplicates.
 */
export function unmappedReferences(
	docs: ReadonlyArray<readonly [string, DocNode]>,
	fileMap: FileMap
): string[] {
	const missing = new Set<string>()
	for (const [, doc] of docs) {
		for (const target of referencedFiles(doc)) {
			if (!fileMap.has(target)) missing.add(target)
		}
	}
	return [...missing].sort()
}

const utf8 = new TextDecoder('utf-8', { fatal: true })

/**
 * Read a source file as strict UTF-8.
 *
 * @throws {TypeError} If the bytes are not valid UTF-8
 */
export async function readSource(filePath: string): Promise<string> {
	return utf8.decode(await readFile(filePath))
}

export interface Discovery {
	/** Assembly files found, sorted and without duplicates */
	readonly files: string[]
	/** Input paths that do not exist */
	readonly missing: string[]
}

async function walk(dir: string, found: Set<string>): Promise<void> {
	const entries: Dirent[] = await readdir(dir, { withFileTypes: true })
	for (const entry of entries) {
		const entryPath = join(dir, entry.name)
		if (entry.isDirectory()) {
			await walk(entryPath, found)
		} else if (entry.isFile() && isAssemblyPath(entry.name)) {
			found.add(entryPath)
		}
	}
}

/**
 * Expand input paths into assembly files. Files are taken when their extension
 * is `.asm` or `.nasm`; directories are walked recursively.
 */
export async function discoverFiles(inputs: readonly string[]): Promise<Discovery> {
	const found = new Set<string>()
	const missing: string[] = []
	for (const input of inputs) {
		try {
			const info = await stat(input)
			if (info.isDirectory()) {
				await walk(input, found)
			} else if (isAssemblyPath(input)) {
				found.add(normalize(input))
			}
		} catch (error: unknown) {
			if (isNodeError(error) && error.code === 'ENOENT') {
				missing.push(input)
			} else {
				throw error
			}
		}
	}
	return { files: [...found].sort(), missing }
}
