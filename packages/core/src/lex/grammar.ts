import type { Node } from 'ohm-js'
import * as ohm from 'ohm-js'

/**
 * A raw lexeme: the grammar rule that matched it and the exact source text.
 */
export interface Lexeme {
	rule: LexemeRule
	text: string
	offset: number
}

export type LexemeRule =
	| 'newline'
	| 'whitespace'
	| 'comment'
	| 'string'
	| 'directive'
	| 'macroArg'
	| 'macroCall'
	| 'dollar'
	| 'word'
	| 'number'
	| 'punctuation'
	| 'invalid'

const LEXEME_RULES: ReadonlySet<string> = new Set<LexemeRule>([
	'comment',
	'directive',
	'dollar',
	'invalid',
	'macroArg',
	'macroCall',
	'newline',
	'number',
	'punctuation',
	'string',
	'whitespace',
	'word',
])

function isLexemeRule(name: string): name is LexemeRule {
	return LEXEME_RULES.has(name)
}

/**
 * NASM lexical grammar for a single line.
 *
 * Every rule is lexical (lowercase), so Ohm skips nothing implicitly.
 * No lexeme spans a newline, so sources are matched one line at a time and
 * the match table never grows with the file.
 * `lexeme` is an ordered choice: the first alternative that matches wins.
 * `invalid` makes the grammar total; the tokenizer reports it as bad input.
 * Keywords, mnemonics and registers are lexed as `word` and classified afterwards.
 */
const grammarSource = String.raw`
NasmLexicon {
  stream = lexeme*

  lexeme = whitespace | comment | string | directive | macroArg
         | macroCall | dollar | word | number | punctuation | invalid

  whitespace = (" " | "\t" | "\x0C" | "\r")+
  comment = ";" (~"\n" any)*

  string = doubleQuoted | singleQuoted
  doubleQuoted = "\"" (escape | ~("\"" | "\\" | "\n") any)* "\""
  singleQuoted = "'" (escape | ~("'" | "\\" | "\n") any)* "'"
  escape = "\\" ~"\n" any

  directive = "%include" | "%define" | "%macro" | "%endmacro"
  macroArg = "%" digit+
  macroCall = "$" macroCallPart+
  macroCallPart = asciiLetter | digit | "_" | "."
  dollar = "$"

  word = wordStart wordPart*
  wordStart = asciiLetter | "_" | "."
  wordPart = asciiLetter | digit | "_" | "." | "$"
  asciiLetter = "a".."z" | "A".."Z"

  number = digit+
  punctuation = ":" | "," | "[" | "]" | "+" | "-" | "*" | "/" | "~" | "|" | "^" | "&" | "(" | ")"

  invalid = any
}
`

/**
 * The compiled lexical grammar.
 */
export const NasmLexicon = ohm.grammar(grammarSource)

const semantics = NasmLexicon.createSemantics()

semantics.addOperation<Lexeme>('toLexeme', {
	lexeme(alternative: Node): Lexeme {
		const rule = alternative.ctorName
		if (!isLexemeRule(rule)) {
			throw new Error(`Unhandled lexeme rule: ${rule}`)
		}
		return { offset: alternative.source.startIdx, rule, text: alternative.sourceString }
	},
})

semantics.addOperation<Lexeme[]>('toLexemes', {
	stream(lexemes: Node): Lexeme[] {
		return lexemes.children.map((lexeme: Node): Lexeme => lexeme['toLexeme']())
	},
})

function scanLine(line: string, offset: number): Lexeme[] {
	const matchResult = NasmLexicon.match(line)
	if (matchResult.failed()) {
		throw new Error(`Lexical grammar rejected input: ${matchResult.shortMessage ?? ''}`)
	}
	const lexemes: Lexeme[] = semantics(matchResult)['toLexemes']()
	return lexemes.map((lexeme) => ({ ...lexeme, offset: lexeme.offset + offset }))
}

/**
 * Split source text into lexemes, whitespace included, lazily line by line.
 * The grammar accepts every line, so this never fails to match.
 */
export function* scanLexemes(source: string): Generator<Lexeme> {
	let start = 0
	while (start <= source.length) {
		const end = source.indexOf('\n', start)
		const stop = end === -1 ? source.length : end
		yield* scanLine(source.slice(start, stop), start)
		if (end === -1) return
		yield { offset: end, rule: 'newline', text: '\n' }
		start = end + 1
	}
}
