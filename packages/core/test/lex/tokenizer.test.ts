import assert from 'node:assert'
import { describe, it } from 'node:test'
import { ParseError } from '../../src/core/errors.ts'
import { TokenKind, type TokenStore, tokenId } from '../../src/core/tokens.ts'
import { tokenize } from '../../src/lex/tokenizer.ts'

function kinds(store: TokenStore): TokenKind[] {
	return [...store].map(([, token]) => token.kind)
}

function texts(store: TokenStore): string[] {
	return [...store].map(([, token]) => token.text)
}

describe('lex/tokenizer', () => {
	describe('basic tokens', () => {
		it('should produce no tokens for empty input', () => {
			const store = tokenize('')
			assert.strictEqual(store.count(), 0)
			assert.deepStrictEqual(store.eof, { column: 1, file: '<input>', line: 1 })
		})

		it('should tokenize an instruction line', () => {
			const store = tokenize('mov rax, 1\n')
			assert.deepStrictEqual(kinds(store), [
				TokenKind.Mnemonic,
				TokenKind.Symbol,
				TokenKind.Comma,
				TokenKind.Number,
				TokenKind.Newline,
			])
			assert.deepStrictEqual(texts(store), ['mov', 'rax', ',', '1', '\n'])
		})

		it('should record line and column of each token', () => {
			const store = tokenize('mov rax, 1\n', { filename: 'src/start.asm' })
			const columns = [...store].map(([, token]) => token.location.column)
			assert.deepStrictEqual(columns, [1, 5, 8, 10, 11])
			assert.strictEqual(store.get(tokenId(store.count() - 1)).location.file, 'src/start.asm')
		})

		it('should reset the column after a newline', () => {
			const store = tokenize('a:\n  b:\n')
			const b = [...store].map(([, token]) => token).find((token) => token.text === 'b')
			assert.deepStrictEqual(b?.location, { column: 3, file: '<input>', line: 2 })
			assert.deepStrictEqual(store.eof, { column: 1, file: '<input>', line: 3 })
		})

		it('should keep byte offsets of tokens', () => {
			const store = tokenize('  ret\n')
			assert.deepStrictEqual(
				[...store].map(([, token]) => token.offset),
				[2, 5]
			)
		})
	})

	describe('keyword precedence', () => {
		it('should classify exact keywords before symbols', () => {
			assert.deepStrictEqual(kinds(tokenize('bits bitsy section Section')), [
				TokenKind.Bits,
				TokenKind.Symbol,
				TokenKind.Section,
				TokenKind.Symbol,
			])
		})

		it('should classify mnemonics only on exact match', () => {
			assert.deepStrictEqual(kinds(tokenize('mov move jne jnz')), [
				TokenKind.Mnemonic,
				TokenKind.Symbol,
				TokenKind.Mnemonic,
				TokenKind.Mnemonic,
			])
		})

		it('should classify numbered registers', () => {
			assert.deepStrictEqual(kinds(tokenize('r12 r12x rax')), [
				TokenKind.Register,
				TokenKind.Symbol,
				TokenKind.Symbol,
			])
		})

		it('should classify size hints', () => {
			assert.deepStrictEqual(kinds(tokenize('qword dword')), [TokenKind.QWord, TokenKind.DWord])
		})

		it('should lex dotted and dollar symbols', () => {
			const store = tokenize('.loop main.end a$b')
			assert.deepStrictEqual(kinds(store), [TokenKind.Symbol, TokenKind.Symbol, TokenKind.Symbol])
			assert.deepStrictEqual(texts(store), ['.loop', 'main.end', 'a$b'])
		})
	})

	describe('preprocessor tokens', () => {
		it('should lex directives', () => {
			assert.deepStrictEqual(kinds(tokenize('%include %define %macro %endmacro')), [
				TokenKind.Include,
				TokenKind.Define,
				TokenKind.Macro,
				TokenKind.EndMacro,
			])
		})

		it('should lex macro arguments and calls', () => {
			const store = tokenize('$print %1 $')
			assert.deepStrictEqual(kinds(store), [
				TokenKind.MacroCall,
				TokenKind.MacroArg,
				TokenKind.CurrentPosition,
			])
			assert.deepStrictEqual(texts(store), ['$print', '%1', '$'])
		})
	})

	describe('literals and comments', () => {
		it('should lex strings with escaped characters', () => {
			const store = tokenize(`"say \\"hi\\"" 'it\\'s'`)
			assert.deepStrictEqual(kinds(store), [TokenKind.String, TokenKind.String])
			assert.deepStrictEqual(texts(store), ['"say \\"hi\\""', "'it\\'s'"])
		})

		it('should place tokens after a wide character by code point', () => {
			const store = tokenize('db "\u{1F600}", 1')
			const comma = [...store].map(([, token]) => token).find((token) => token.text === ',')
			assert.deepStrictEqual(comma?.location, { column: 7, file: '<input>', line: 1 })
			assert.strictEqual(comma?.offset, 7)
		})

		it('should lex a comment up to the end of the line', () => {
			const store = tokenize('; entry point\nret\n')
			assert.deepStrictEqual(texts(store), ['; entry point', '\n', 'ret', '\n'])
			assert.strictEqual(store.get(tokenId(0)).kind, TokenKind.Comment)
		})

		it('should lex punctuation', () => {
			assert.deepStrictEqual(kinds(tokenize('[rbp-8]*(1+2)/3~|^&:')), [
				TokenKind.LeftBracket,
				TokenKind.Symbol,
				TokenKind.Minus,
				TokenKind.Number,
				TokenKind.RightBracket,
				TokenKind.Asterisk,
				TokenKind.LeftParen,
				TokenKind.Number,
				TokenKind.Plus,
				TokenKind.Number,
				TokenKind.RightParen,
				TokenKind.Slash,
				TokenKind.Number,
				TokenKind.Tilde,
				TokenKind.Pipe,
				TokenKind.Caret,
				TokenKind.Ampersand,
				TokenKind.Colon,
			])
		})

		it('should discard tabs, form feeds and carriage returns', () => {
			assert.deepStrictEqual(kinds(tokenize('\tret\x0C\r\n')), [TokenKind.Mnemonic, TokenKind.Newline])
		})
	})

	describe('large sources', () => {
		it('should tokenize a few hundred kilobytes in bounded time', () => {
			const block = 'loop_label:\n  mov rax, [rbx + 8] ; comment\n'
			const source = block.repeat(8000)
			const started = performance.now()
			const store = tokenize(source)
			const elapsed = performance.now() - started
			assert.strictEqual(store.count(), 13 * 8000)
			assert.deepStrictEqual(store.eof, { column: 1, file: '<input>', line: 16001 })
			assert.ok(elapsed < 5000, `tokenizing ${source.length} characters took ${Math.round(elapsed)} ms`)
		})

		it('should keep offsets and lines across line boundaries', () => {
			const store = tokenize('a:\n\n  "x" ; y\nret')
			assert.deepStrictEqual(
				[...store].map(([, token]) => [token.text, token.offset, token.location.line]),
				[
					['a', 0, 1],
					[':', 1, 1],
					['\n', 2, 1],
					['\n', 3, 2],
					['"x"', 6, 3],
					['; y', 10, 3],
					['\n', 13, 3],
					['ret', 14, 4],
				]
			)
		})
	})

	describe('invalid input', () => {
		it('should fail at the first unknown character', () => {
			assert.throws(
				() => tokenize('mov rax, @\n'),
				(error: unknown) => {
					assert.ok(error instanceof ParseError)
					assert.deepStrictEqual(error.kind, { type: 'invalid-input' })
					assert.deepStrictEqual(error.trace, [
						{ location: { column: 10, file: '<input>', line: 1 }, rule: 'lex' },
					])
					assert.strictEqual(error.message, 'invalid input: lex(<input>:1:10)')
					return true
				}
			)
		})

		it('should fail at the opening quote of an unterminated string', () => {
			assert.throws(
				() => tokenize('db "abc\n', { filename: 'data.asm' }),
				(error: unknown) => {
					assert.ok(error instanceof ParseError)
					assert.deepStrictEqual(error.location, { column: 4, file: 'data.asm', line: 1 })
					return true
				}
			)
		})

		it('should not let a string continue onto the next line', () => {
			assert.throws(
				() => tokenize("db 'ab\\\ncd'\n"),
				(error: unknown) => {
					assert.ok(error instanceof ParseError)
					assert.deepStrictEqual(error.location, { column: 4, file: '<input>', line: 1 })
					return true
				}
			)
		})

		it('should reject unknown percent directives', () => {
			assert.throws(() => tokenize('%ifdef X\n'), ParseError)
		})
	})
})
