/**
 * Backend-agnostic documentation tree.
 * Ownership flows parent to child; backends walk it without back-references.
 */

export type DocNode =
	| {
			readonly kind: 'file'
			readonly path: string
			readonly symbols: DocNode
			readonly defines: DocNode
			readonly macros: DocNode
	  }
	| { readonly kind: 'paragraphs'; readonly items: readonly DocNode[] }
	| { readonly kind: 'list'; readonly items: readonly DocNode[] }
	| {
			readonly kind: 'table'
			readonly header: readonly DocNode[]
			readonly rows: readonly (readonly DocNode[])[]
	  }
	| { readonly kind: 'macro'; readonly name: string; readonly argCount: number }
	| { readonly kind: 'define'; readonly name: string }
	| { readonly kind: 'inline-code'; readonly code: string }
	| { readonly kind: 'text'; readonly text: string }
	/** Several lines inside one table cell. */
	| { readonly kind: 'cell-lines'; readonly lines: readonly DocNode[] }
	/** A link to another source file's documentation. */
	| { readonly kind: 'resolve-file'; readonly path: string }
	| { readonly kind: 'concat'; readonly items: readonly DocNode[] }

export type DocNodeKind = DocNode['kind']

export function text(value: string): DocNode {
	return { kind: 'text', text: value }
}

export function inlineCode(code: string): DocNode {
	return { code, kind: 'inline-code' }
}

export function concat(...items: DocNode[]): DocNode {
	return { items, kind: 'concat' }
}

/** Whether rendering `node` would produce no content worth a heading. */
export function isEmptyDoc(node: DocNode): boolean {
	switch (node.kind) {
		case 'paragraphs':
		case 'list':
		case 'concat':
			return node.items.length === 0
		case 'table':
			return node.rows.length === 0
		case 'cell-lines':
			return node.lines.length === 0
		case 'file':
		case 'macro':
		case 'define':
		case 'inline-code':
		case 'text':
		case 'resolve-file':
			return false
	}
}

/** Every source path a tree links to, so callers can check their file map. */
export function referencedFiles(node: DocNode): Set<string> {
	const found = new Set<string>()
	const visit = (current: DocNode): void => {
		switch (current.kind) {
			case 'file':
				visit(current.symbols)
				visit(current.defines)
				visit(current.macros)
				return
			case 'paragraphs':
			case 'list':
			case 'concat':
				current.items.forEach(visit)
				return
			case 'table':
				current.header.forEach(visit)
				for (const row of current.rows) row.forEach(visit)
				return
			case 'cell-lines':
				current.lines.forEach(visit)
				return
			case 'resolve-file':
				found.add(current.path)
				return
			default:
				return
		}
	}
	visit(node)
	return found
}
