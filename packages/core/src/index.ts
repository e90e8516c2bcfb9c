/**
 * asmdoc core public API
 *
 * Pipeline:
 * 1. Tokenization (source -> tokens)
 * 2. Parsing (tokens -> one AssemblyFile per source)
 * 3. Resolution (all files -> AssemblyProject)
 * 4. Projection (project -> one DocNode tree per file), rendered by a DocsBackend
 */

import type { ParseError } from './core/errors.ts'
import type { DocsBackend, FileMap } from './docs/backend.ts'
import type { AssemblyFile } from './model/file.ts'
import { parse } from './parse/parser.ts'
import type { Syntax } from './parse/syntax.ts'
import { type AssemblyProject, resolve } from './project/project.ts'

export {
	formatParseError,
	formatTrace,
	ParseError,
	type ParseErrorKind,
	type ReceivedToken,
	type TraceFrame,
} from './core/errors.ts'
export { formatLocation, LocationCursor, type SourceLocation } from './core/location.ts'
export {
	type Token,
	type TokenId,
	TokenKind,
	TokenStore,
	tokenId,
	tokenKindName,
} from './core/tokens.ts'
export {
	concat,
	type DocNode,
	type DocNodeKind,
	type DocsBackend,
	type FileMap,
	GENERATED_NOTICE,
	generateFileDocs,
	inlineCode,
	isEmptyDoc,
	MarkdownBackend,
	RenderError,
	referencedFiles,
	text,
} from './docs/index.ts'
export { type TokenizeOptions, tokenize } from './lex/index.ts'
export {
	type AssemblyDefine,
	type AssemblyFile,
	type AssemblyItem,
	type AssemblyMacro,
	DEFAULT_BITS,
	describeSection,
	type LabelItem,
	type MacroCallItem,
	Section,
} from './model/index.ts'
export { NasmParser, nasm, type ParseOptions, type ParseResult, parse, type Syntax } from './parse/index.ts'
export {
	AssemblyProject,
	type GlobalCollision,
	type ProjectSymbol,
	type ResolvedTables,
	resolve,
	resolveTables,
	Visibility,
} from './project/index.ts'

export interface SourceInput {
	readonly path: string
	readonly source: string
}

export interface ParseFailure {
	readonly path: string
	readonly source: string
	readonly error: ParseError
}

export interface ProjectBuild {
	/** Project resolved from the files that parsed */
	readonly project: AssemblyProject
	readonly failures: readonly ParseFailure[]
}

/**
 * Parse every source independently, then resolve the ones that succeeded.
 * A failing file never affects the others; the caller decides what to do with
 * `failures`.
 */
export function buildProject(
	inputs: Iterable<SourceInput>,
	options: { syntax?: Syntax } = {}
): ProjectBuild {
	const files = new Map<string, AssemblyFile>()
	const failures: ParseFailure[] = []

	for (const { path, source } of inputs) {
		const result = parse(source, {
			filename: path,
			...(options.syntax ? { syntax: options.syntax } : {}),
		})
		if (result.succeeded) {
			files.set(path, result.file)
		} else {
			failures.push({ error: result.error, path, source })
		}
	}

	return { failures, project: resolve(files) }
}

/**
 * Render every file's documentation with `backend`.
 *
 * @throws {RenderError} If a document links to a file missing from `fileMap`
 */
export function renderProject(
	project: AssemblyProject,
	backend: DocsBackend,
	fileMap: FileMap
): Array<[string, string]> {
	return project.generateDocs().map(([path, doc]): [string, string] => [path, backend.render(doc, fileMap)])
}
