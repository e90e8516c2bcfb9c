/**
 * Documentation trees and their renderers.
 */

export type { DocsBackend, FileMap } from './backend.ts'
export { generateFileDocs } from './generate.ts'
export { GENERATED_NOTICE, MarkdownBackend, RenderError } from './markdown.ts'
export {
	concat,
	type DocNode,
	type DocNodeKind,
	inlineCode,
	isEmptyDoc,
	referencedFiles,
	text,
} from './nodes.ts'
