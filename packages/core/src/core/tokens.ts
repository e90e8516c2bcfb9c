/**
 * Token storage using a dense array with integer IDs.
 */

import type { SourceLocation } from './location.ts'

/** Token kinds - small integer discriminant. */
export const TokenKind = {
	Ampersand: 44,
	Asterisk: 37,
	Bits: 10,
	Caret: 43,
	Colon: 30,
	Comma: 31,
	Comment: 3,
	CurrentPosition: 104,
	Define: 21,
	DWord: 15,
	EndMacro: 23,
	Extern: 13,
	Global: 12,
	Include: 20,
	LeftBracket: 32,
	LeftParen: 45,
	Macro: 22,
	MacroArg: 102,
	MacroCall: 101,
	Minus: 35,
	Mnemonic: 16,
	Newline: 2,
	Number: 105,
	Pipe: 42,
	Plus: 34,
	QWord: 14,
	Register: 103,
	RightBracket: 33,
	RightParen: 46,
	Section: 11,
	Slash: 38,
	String: 106,
	Symbol: 100,
	Tilde: 41,
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

const TOKEN_KIND_NAMES: ReadonlyMap<TokenKind, string> = new Map(
	Object.entries(TokenKind).map(([name, kind]): [TokenKind, string] => [kind, name])
)

/** Name of a token kind as it appears in diagnostics, e.g. `Symbol`. */
export function tokenKindName(kind: TokenKind): string {
	return TOKEN_KIND_NAMES.get(kind) ?? `Token(${kind})`
}

export type TokenId = number & { readonly __brand: 'TokenId' }

export function tokenId(n: number): TokenId {
	return n as TokenId
}

/**
 * A single classified lexeme.
 * `text` is the exact source substring; `offset` is its 0-based start.
 */
export interface Token {
	readonly kind: TokenKind
	readonly text: string
	readonly offset: number
	readonly location: SourceLocation
}

/**
 * Dense array storage for tokens.
 * Append-only during tokenization; `eof` marks the position after the last character.
 */
export class TokenStore {
	private readonly tokens: Token[] = []

	constructor(readonly eof: SourceLocation) {}

	add(token: Token): TokenId {
		const id = tokenId(this.tokens.length)
		this.tokens.push(token)
		return id
	}

	get(id: TokenId): Token {
		const token = this.tokens[id]
		if (token === undefined) {
			throw new Error(`Invalid TokenId: ${id}`)
		}
		return token
	}

	count(): number {
		return this.tokens.length
	}

	isValid(id: TokenId): boolean {
		return id >= 0 && id < this.tokens.length
	}

	*[Symbol.iterator](): Generator<[TokenId, Token]> {
		for (let i = 0; i < this.tokens.length; i++) {
			const token = this.tokens[i]
			if (token !== undefined) yield [tokenId(i), token]
		}
	}

	/** Returns tokens in range [start, end). */
	slice(start: TokenId, end: TokenId): Token[] {
		return this.tokens.slice(start, end)
	}
}
