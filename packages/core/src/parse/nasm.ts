import { ParseError, type ParseErrorKind, type TraceFrame } from '../core/errors.ts'
import { type Token, type TokenId, TokenKind, type TokenStore, tokenId, tokenKindName } from '../core/tokens.ts'
import { tokenize } from '../lex/tokenizer.ts'
import {
	type AssemblyFile,
	type AssemblyFileBuilder,
	createAssemblyFile,
	pushItem,
	Section,
	sectionFromName,
} from '../model/file.ts'
import type { Syntax } from './syntax.ts'

/**
 * Recursive-descent parser over NASM tokens.
 *
 * Each rule pushes a `(rule, location)` frame on entry and pops it on success.
 * A failure snapshots the stack, so the error shows the rules that were active.
 * Parsers are single-use: construct, call `parse()` once.
 */
export class NasmParser {
	private pos = 0
	private readonly file: AssemblyFileBuilder = createAssemblyFile()
	private currentSection: Section = Section.Text
	private readonly ruleStack: TraceFrame[] = []

	constructor(private readonly tokens: TokenStore) {}

	parse(): AssemblyFile {
		if (!this.isEof()) {
			this.ruleStack.push({ location: this.current().location, rule: 'parse' })
		}
		this.skip()
		while (!this.isEof()) {
			this.dispatch(this.current())
			this.skip()
		}
		return this.file
	}

	private dispatch(token: Token): void {
		switch (token.kind) {
			case TokenKind.Bits:
				return this.rule('bits', () => this.bits())
			case TokenKind.Section:
				return this.rule('section', () => this.section())
			case TokenKind.Symbol:
				if (this.peekIs(TokenKind.Colon)) {
					return this.rule('label', () => this.label())
				}
				throw this.error({ type: 'invalid-syntax' })
			case TokenKind.Mnemonic:
				return this.rule('mnemonic', () => this.mnemonic())
			case TokenKind.Global:
				return this.rule('global', () => this.global())
			case TokenKind.Extern:
				return this.rule('extern', () => this.extern())
			case TokenKind.Include:
				return this.rule('include', () => this.include())
			case TokenKind.Define:
				return this.rule('define', () => this.define())
			case TokenKind.Macro:
				return this.rule('macroDefinition', () => this.macroDefinition())
			case TokenKind.MacroCall:
				return this.rule('macroCall', () => this.macroCall())
			case TokenKind.Comment:
				// Comments are not attached to any item yet.
				this.advance()
				return
			default:
				throw this.error({ type: 'invalid-syntax' })
		}
	}

	// ===========================================================================
	// RULES
	// ===========================================================================

	private bits(): void {
		this.expect(TokenKind.Bits)
		this.file.bits = this.unsignedInteger(this.expect(TokenKind.Number))
	}

	private section(): void {
		this.expect(TokenKind.Section)
		const section = sectionFromName(this.expect(TokenKind.Symbol).text)
		if (section === null) {
			throw this.error({ type: 'invalid-syntax' })
		}
		this.currentSection = section
		this.expectNewline()
	}

	private label(): void {
		const name = this.expect(TokenKind.Symbol)
		this.expect(TokenKind.Colon)
		pushItem(this.file, this.currentSection, {
			kind: 'label',
			location: name.location,
			name: name.text,
		})
	}

	private mnemonic(): void {
		this.expect(TokenKind.Mnemonic)
		this.restOfLine()
		this.expectNewline()
	}

	private global(): void {
		this.expect(TokenKind.Global)
		const name = this.expect(TokenKind.Symbol).text
		this.expectNewline()
		this.file.globals.add(name)
	}

	private extern(): void {
		this.expect(TokenKind.Extern)
		const name = this.expect(TokenKind.Symbol).text
		this.expectNewline()
		this.file.externs.push(name)
	}

	private include(): void {
		this.expect(TokenKind.Include)
		const literal = this.expect(TokenKind.String).text
		this.expectNewline()
		this.file.includes.push(literal.slice(1, -1))
	}

	private define(): void {
		this.expect(TokenKind.Define)
		const name = this.expect(TokenKind.Symbol).text
		const value = this.restOfLine()
		this.expectNewline()
		this.file.defines.push({ name, value })
	}

	private macroDefinition(): void {
		this.expect(TokenKind.Macro)
		const name = this.peekIs(TokenKind.Symbol, 0)
			? this.expect(TokenKind.Symbol)
			: this.expect(TokenKind.MacroCall)
		const argCount = this.unsignedInteger(this.expect(TokenKind.Number))
		const body = this.takeUntil(TokenKind.EndMacro)
		this.expect(TokenKind.EndMacro)
		this.file.macros.push({ argCount, body, name: name.text })
	}

	private macroCall(): void {
		const name = this.expect(TokenKind.MacroCall)
		const args = this.restOfLine()
		this.expectNewline()
		pushItem(this.file, this.currentSection, {
			args,
			kind: 'macro-call',
			location: name.location,
			name: name.text,
		})
	}

	// ===========================================================================
	// TOKEN CURSOR
	// ===========================================================================

	private rule(name: string, body: () => void): void {
		// `dispatch` only enters rules on a current token, so this holds for the
		// NASM rules; it stays for rules entered from inside another rule.
		if (this.isEof()) {
			throw this.error({ type: 'unexpected-eof' })
		}
		this.ruleStack.push({ location: this.current().location, rule: name })
		body()
		this.ruleStack.pop()
	}

	private isEof(): boolean {
		return this.pos >= this.tokens.count()
	}

	private current(): Token {
		return this.tokens.get(tokenId(this.pos))
	}

	private advance(): void {
		this.pos++
	}

	/** Whether the token `offset` places ahead of the current one has `kind`. */
	private peekIs(kind: TokenKind, offset = 1): boolean {
		const id = tokenId(this.pos + offset)
		return this.tokens.isValid(id) && this.tokens.get(id).kind === kind
	}

	/** Skip blank lines between statements. */
	private skip(): void {
		while (!this.isEof() && this.current().kind === TokenKind.Newline) {
			this.advance()
		}
	}

	/** Consume tokens up to, not including, the next `kind` (or end of input). */
	private takeUntil(kind: TokenKind): Token[] {
		const start: TokenId = tokenId(this.pos)
		while (!this.isEof() && this.current().kind !== kind) {
			this.advance()
		}
		return this.tokens.slice(start, tokenId(this.pos))
	}

	private restOfLine(): Token[] {
		return this.takeUntil(TokenKind.Newline)
	}

	/** Consume the current token if it has `kind`; a mismatch is left in place. */
	private expect(kind: TokenKind): Token {
		if (this.isEof()) {
			throw this.error({ expected: kind, received: null, type: 'unexpected' })
		}
		const token = this.current()
		if (token.kind !== kind) {
			throw this.error({
				expected: kind,
				received: { kind: token.kind, text: token.text },
				type: 'unexpected',
			})
		}
		this.advance()
		return token
	}

	private expectNewline(): Token {
		return this.expect(TokenKind.Newline)
	}

	private unsignedInteger(token: Token): number {
		const value = Number(token.text)
		if (!Number.isSafeInteger(value) || value < 0) {
			throw this.error({ type: 'invalid-syntax' })
		}
		return value
	}

	/** Snapshot the rule stack, ending with the token parsing stopped at. */
	private error(kind: ParseErrorKind): ParseError {
		const last: TraceFrame = this.isEof()
			? { location: this.tokens.eof, rule: 'end-of-file' }
			: { location: this.current().location, rule: tokenKindName(this.current().kind) }
		return new ParseError(kind, [...this.ruleStack, last])
	}
}

/**
 * The NASM front end.
 */
export const nasm: Syntax = {
	name: 'nasm',
	parse(source: string, filename: string): AssemblyFile {
		return new NasmParser(tokenize(source, { filename })).parse()
	},
}
