import type { DocNode } from './nodes.ts'

/**
 * Maps each source path to where its documentation is written, relative to
 * the other documents.
 */
export type FileMap = ReadonlyMap<string, string>

/**
 * An output format for documentation trees.
 */
export interface DocsBackend {
	/** File extension of rendered documents, without the dot */
	readonly extension: string
	render(doc: DocNode, fileMap: FileMap): string
}
