/**
 * Lexical analysis module.
 * Tokenizes assembly source into a flat array of tokens.
 */

export { type Lexeme, type LexemeRule, NasmLexicon, scanLexemes } from './grammar.ts'
export { classifyWord, DIRECTIVES, KEYWORDS, MNEMONICS, PUNCTUATION } from './keywords.ts'
export { type TokenizeOptions, tokenize } from './tokenizer.ts'
