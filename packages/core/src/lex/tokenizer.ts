import { ParseError } from '../core/errors.ts'
import { LocationCursor, type SourceLocation } from '../core/location.ts'
import { TokenKind, TokenStore } from '../core/tokens.ts'
import { type Lexeme, scanLexemes } from './grammar.ts'
import { classifyWord, DIRECTIVES, PUNCTUATION } from './keywords.ts'

export interface TokenizeOptions {
	/** Path used in token locations */
	filename?: string
}

function lookup(table: ReadonlyMap<string, TokenKind>, text: string): TokenKind {
	const kind = table.get(text)
	if (kind === undefined) {
		throw new Error(`No token kind for lexeme \`${text}\``)
	}
	return kind
}

/** Token kind for a lexeme, or `null` for discarded whitespace. */
function kindOf(lexeme: Lexeme): TokenKind | null {
	switch (lexeme.rule) {
		case 'whitespace':
			return null
		case 'newline':
			return TokenKind.Newline
		case 'comment':
			return TokenKind.Comment
		case 'string':
			return TokenKind.String
		case 'directive':
			return lookup(DIRECTIVES, lexeme.text)
		case 'macroArg':
			return TokenKind.MacroArg
		case 'macroCall':
			return TokenKind.MacroCall
		case 'dollar':
			return TokenKind.CurrentPosition
		case 'word':
			return classifyWord(lexeme.text)
		case 'number':
			return TokenKind.Number
		case 'punctuation':
			return lookup(PUNCTUATION, lexeme.text)
		case 'invalid':
			return null
	}
}

/**
 * Tokenize assembly source.
 * Whitespace is dropped; newlines are kept as statement separators.
 *
 * @throws {ParseError} `invalid-input` at the first character no token rule matches
 */
export function tokenize(source: string, options: TokenizeOptions = {}): TokenStore {
	const filename = options.filename ?? '<input>'
	const cursor = new LocationCursor(filename)
	const lexemes = scanLexemes(source)
	const pending: Array<{ kind: TokenKind; lexeme: Lexeme; location: SourceLocation }> = []

	for (const lexeme of lexemes) {
		if (lexeme.rule === 'invalid') {
			throw new ParseError({ type: 'invalid-input' }, [
				{ location: cursor.current(), rule: 'lex' },
			])
		}
		const kind = kindOf(lexeme)
		if (kind !== null) {
			pending.push({ kind, lexeme, location: cursor.current() })
		}
		cursor.advance(lexeme.text)
	}

	const store = new TokenStore(cursor.current())
	for (const { kind, lexeme, location } of pending) {
		store.add({ kind, location, offset: lexeme.offset, text: lexeme.text })
	}
	return store
}
