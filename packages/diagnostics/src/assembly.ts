/**
 * Core diagnostic definitions.
 *
 * Error code format: ASM<PHASE><NUMBER>
 * - ASMLEX: Lexer errors (001-099)
 * - ASMPARSE: Parser errors (001-099)
 * - ASMPROJ: Project resolution errors (001-049), warnings (050-099)
 * - ASMDOC: Rendering errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// LEXER ERRORS (ASMLEX001-099)
// =============================================================================

export const ASMLEX001: DiagnosticDef = {
	code: 'ASMLEX001',
	description: "This character doesn't start any token the assembler knows about.",
	message: 'invalid input',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the character, or close the string literal that starts here.',
}

// =============================================================================
// PARSER ERRORS (ASMPARSE001-099)
// =============================================================================

export const ASMPARSE001: DiagnosticDef = {
	code: 'ASMPARSE001',
	description: 'A grammar rule was entered after the last token of the file.',
	message: 'unexpected end-of-file',
	severity: DiagnosticSeverity.Error,
}

export const ASMPARSE002: DiagnosticDef = {
	code: 'ASMPARSE002',
	description: 'The file ended where another token was required.',
	message: 'expected {expected}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add the missing {expected}; statements end with a newline.',
}

export const ASMPARSE003: DiagnosticDef = {
	code: 'ASMPARSE003',
	description: 'A different kind of token was found where the grammar required another.',
	message: 'expected {expected}, but received {received} (`{text}`)',
	severity: DiagnosticSeverity.Error,
}

export const ASMPARSE004: DiagnosticDef = {
	code: 'ASMPARSE004',
	description:
		'The token has the right shape but its value is not allowed here, such as an unknown section name or a count that is not an unsigned integer.',
	message: 'invalid syntax',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Sections are .text, .data, .rodata and .bss; counts are unsigned integers.',
}

// =============================================================================
// PROJECT WARNINGS (ASMPROJ050-099)
// =============================================================================

export const ASMPROJ050: DiagnosticDef = {
	code: 'ASMPROJ050',
	description:
		'Two files declare the same symbol global. The first file in path order keeps the definition.',
	message: 'global `{name}` is already declared in {kept}; ignoring the declaration in {ignored}',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Rename one of the symbols or drop one of the global directives.',
}

// =============================================================================
// RENDERING ERRORS (ASMDOC001-099)
// =============================================================================

export const ASMDOC001: DiagnosticDef = {
	code: 'ASMDOC001',
	description: 'A document links to a file that has no output location.',
	message: 'no output path for referenced file {path}',
	severity: DiagnosticSeverity.Error,
}
