import { type AssemblyFile, describeSection } from '../model/file.ts'
import type { ProjectSymbol, ResolvedTables } from '../project/project.ts'
import { concat, type DocNode, inlineCode, text } from './nodes.ts'

const SUB_LABEL_INDENT = '&nbsp;&nbsp;'

const SYMBOL_TABLE_HEADER: readonly DocNode[] = [
	text('Visibility'),
	text('Symbol'),
	text('Section'),
	text('Defined in'),
]

function symbolRow(
	name: string,
	symbol: ProjectSymbol,
	tables: Pick<ResolvedTables, 'internalExterns' | 'symbolConstituents'>
): DocNode[] {
	const constituents = tables.symbolConstituents.get(name) ?? []
	const nameCell: DocNode = {
		kind: 'cell-lines',
		lines: [
			inlineCode(name),
			...constituents.map((subLabel) => concat(text(SUB_LABEL_INDENT), inlineCode(subLabel))),
		],
	}
	const definingFile = symbol.visibility === 'external' ? tables.internalExterns.get(name) : undefined

	return [
		text(symbol.visibility),
		nameCell,
		text(symbol.section === null ? '' : describeSection(symbol.section)),
		definingFile === undefined ? text('') : { kind: 'resolve-file', path: definingFile },
	]
}

function symbolTable(
	symbols: ReadonlyMap<string, ProjectSymbol>,
	tables: Pick<ResolvedTables, 'internalExterns' | 'symbolConstituents'>
): DocNode {
	return {
		header: SYMBOL_TABLE_HEADER,
		kind: 'table',
		rows: [...symbols].map(([name, symbol]) => symbolRow(name, symbol, tables)),
	}
}

/**
 * Project one resolved file into a document tree: its symbol table, defines
 * and macros.
 */
export function generateFileDocs(
	project: ResolvedTables & { readonly files: ReadonlyMap<string, AssemblyFile> },
	path: string
): DocNode {
	const file = project.files.get(path)
	const symbols = project.symbols.get(path) ?? new Map<string, ProjectSymbol>()

	return {
		defines: {
			items: (file?.defines ?? []).map((define): DocNode => ({ kind: 'define', name: define.name })),
			kind: 'list',
		},
		kind: 'file',
		macros: {
			items: (file?.macros ?? []).map(
				(macro): DocNode => ({ argCount: macro.argCount, kind: 'macro', name: macro.name })
			),
			kind: 'list',
		},
		path,
		symbols: symbolTable(symbols, project),
	}
}
