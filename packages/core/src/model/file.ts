/**
 * Assembly file representation optimized for documentation generation.
 * Built once by a parser and read-only afterwards.
 */

import type { SourceLocation } from '../core/location.ts'
import type { Token } from '../core/tokens.ts'

export const Section = {
	Bss: 'bss',
	Data: 'data',
	ReadOnlyData: 'rodata',
	Text: 'text',
} as const

export type Section = (typeof Section)[keyof typeof Section]

const SECTION_BY_NAME: ReadonlyMap<string, Section> = new Map([
	['.bss', Section.Bss],
	['.data', Section.Data],
	['.rodata', Section.ReadOnlyData],
	['.text', Section.Text],
])

/** Section for a `section` directive operand, case-insensitively; `null` if unknown. */
export function sectionFromName(name: string): Section | null {
	return SECTION_BY_NAME.get(name.toLowerCase()) ?? null
}

export function describeSection(section: Section): string {
	switch (section) {
		case Section.Text:
			return 'text'
		case Section.Data:
			return 'data'
		case Section.Bss:
			return 'bss'
		case Section.ReadOnlyData:
			return 'read-only data'
	}
}

export interface LabelItem {
	readonly kind: 'label'
	readonly name: string
	readonly location: SourceLocation
}

export interface MacroCallItem {
	readonly kind: 'macro-call'
	readonly name: string
	/** Raw tokens after the call name, up to the end of the line. */
	readonly args: readonly Token[]
	readonly location: SourceLocation
}

export type AssemblyItem = LabelItem | MacroCallItem

export interface AssemblyMacro {
	readonly name: string
	readonly argCount: number
	/** Raw tokens between the macro header and `%endmacro`; never interpreted. */
	readonly body: readonly Token[]
}

export interface AssemblyDefine {
	readonly name: string
	/** Raw tokens after the define name, up to the end of the line. */
	readonly value: readonly Token[]
}

export interface AssemblyFile {
	readonly bits: number
	readonly includes: readonly string[]
	readonly globals: ReadonlySet<string>
	readonly externs: readonly string[]
	readonly macros: readonly AssemblyMacro[]
	readonly defines: readonly AssemblyDefine[]
	/** Items grouped by section, in the order each section first received one. */
	readonly sections: ReadonlyMap<Section, readonly AssemblyItem[]>
}

/**
 * Mutable form used while a parser fills the model in.
 */
export interface AssemblyFileBuilder {
	bits: number
	includes: string[]
	globals: Set<string>
	externs: string[]
	macros: AssemblyMacro[]
	defines: AssemblyDefine[]
	sections: Map<Section, AssemblyItem[]>
}

export const DEFAULT_BITS = 64

export function createAssemblyFile(): AssemblyFileBuilder {
	return {
		bits: DEFAULT_BITS,
		defines: [],
		externs: [],
		globals: new Set(),
		includes: [],
		macros: [],
		sections: new Map(),
	}
}

/** Append an item to a section's list, creating the list on first use. */
export function pushItem(file: AssemblyFileBuilder, section: Section, item: AssemblyItem): void {
	const items = file.sections.get(section)
	if (items === undefined) {
		file.sections.set(section, [item])
	} else {
		items.push(item)
	}
}

export function labelsIn(items: readonly AssemblyItem[]): LabelItem[] {
	return items.filter((item): item is LabelItem => item.kind === 'label')
}

export function isSubLabel(name: string): boolean {
	return name.startsWith('.')
}
