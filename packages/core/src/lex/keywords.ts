import { TokenKind } from '../core/tokens.ts'

/** Words with a fixed token kind. Matching is exact and case-sensitive. */
export const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map([
	['bits', TokenKind.Bits],
	['dword', TokenKind.DWord],
	['extern', TokenKind.Extern],
	['global', TokenKind.Global],
	['qword', TokenKind.QWord],
	['section', TokenKind.Section],
])

export const DIRECTIVES: ReadonlyMap<string, TokenKind> = new Map([
	['%define', TokenKind.Define],
	['%endmacro', TokenKind.EndMacro],
	['%include', TokenKind.Include],
	['%macro', TokenKind.Macro],
])

/**
 * Instruction and data mnemonics. Operands are never decoded, so the set only
 * needs to tell statements apart from labels.
 */
export const MNEMONICS: ReadonlySet<string> = new Set([
	'add',
	'align',
	'and',
	'call',
	'cmp',
	'db',
	'dd',
	'dec',
	'div',
	'dq',
	'dw',
	'equ',
	'imul',
	'inc',
	'je',
	'jmp',
	'jne',
	'jnz',
	'jz',
	'lea',
	'leave',
	'mov',
	'mul',
	'nop',
	'not',
	'or',
	'pop',
	'push',
	'resb',
	'resd',
	'resq',
	'resw',
	'ret',
	'shl',
	'shr',
	'sub',
	'syscall',
	'test',
	'times',
	'xor',
])

export const PUNCTUATION: ReadonlyMap<string, TokenKind> = new Map([
	['&', TokenKind.Ampersand],
	['(', TokenKind.LeftParen],
	[')', TokenKind.RightParen],
	['*', TokenKind.Asterisk],
	['+', TokenKind.Plus],
	[',', TokenKind.Comma],
	['-', TokenKind.Minus],
	['/', TokenKind.Slash],
	[':', TokenKind.Colon],
	['[', TokenKind.LeftBracket],
	[']', TokenKind.RightBracket],
	['^', TokenKind.Caret],
	['|', TokenKind.Pipe],
	['~', TokenKind.Tilde],
])

const REGISTER = /^r[0-9]+$/

/** Classify a `word` lexeme: keyword, then mnemonic, then register, else symbol. */
export function classifyWord(word: string): TokenKind {
	const keyword = KEYWORDS.get(word)
	if (keyword !== undefined) return keyword
	if (MNEMONICS.has(word)) return TokenKind.Mnemonic
	if (REGISTER.test(word)) return TokenKind.Register
	return TokenKind.Symbol
}
