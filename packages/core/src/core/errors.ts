/**
 * Parse failures carry their diagnostic definition and the rule trace that was
 * active when they were raised.
 */

import {
	ASMLEX001,
	ASMPARSE001,
	ASMPARSE002,
	ASMPARSE003,
	ASMPARSE004,
	type DiagnosticArgs,
	type DiagnosticDef,
	formatSuggestion,
	interpolateMessage,
} from './diagnostics.ts'
import { formatLocation, type SourceLocation } from './location.ts'
import { type TokenKind, tokenKindName } from './tokens.ts'

export interface ReceivedToken {
	readonly kind: TokenKind
	readonly text: string
}

export type ParseErrorKind =
	| { readonly type: 'invalid-input' }
	| { readonly type: 'unexpected-eof' }
	| {
			readonly type: 'unexpected'
			readonly expected: TokenKind
			/** `null` when the input ended instead. */
			readonly received: ReceivedToken | null
	  }
	| { readonly type: 'invalid-syntax' }

/** One active grammar rule, or the token the parser stopped at. */
export interface TraceFrame {
	readonly rule: string
	readonly location: SourceLocation
}

function showTokenText(text: string): string {
	return text.replace(/\r/g, '\\r').replace(/\n/g, '\\n')
}

function describeKind(kind: ParseErrorKind): { def: DiagnosticDef; args: DiagnosticArgs } {
	switch (kind.type) {
		case 'invalid-input':
			return { args: {}, def: ASMLEX001 }
		case 'unexpected-eof':
			return { args: {}, def: ASMPARSE001 }
		case 'unexpected':
			if (kind.received === null) {
				return { args: { expected: tokenKindName(kind.expected) }, def: ASMPARSE002 }
			}
			return {
				args: {
					expected: tokenKindName(kind.expected),
					received: tokenKindName(kind.received.kind),
					text: showTokenText(kind.received.text),
				},
				def: ASMPARSE003,
			}
		case 'invalid-syntax':
			return { args: {}, def: ASMPARSE004 }
	}
}

/** `parse(a.asm:1:1) > global(a.asm:1:1) > Newline(a.asm:1:7)` */
export function formatTrace(trace: readonly TraceFrame[]): string {
	return trace.map((frame) => `${frame.rule}(${formatLocation(frame.location)})`).join(' > ')
}

export class ParseError extends Error {
	readonly kind: ParseErrorKind
	readonly trace: readonly TraceFrame[]
	readonly def: DiagnosticDef
	readonly args: DiagnosticArgs
	/** Interpolated message without the trace. */
	readonly detail: string

	constructor(kind: ParseErrorKind, trace: readonly TraceFrame[]) {
		const { def, args } = describeKind(kind)
		const detail = interpolateMessage(def.message, args)
		super(trace.length > 0 ? `${detail}: ${formatTrace(trace)}` : detail)
		this.name = 'ParseError'
		this.kind = kind
		this.trace = trace
		this.def = def
		this.args = args
		this.detail = detail
	}

	get code(): string {
		return this.def.code
	}

	/** Where parsing stopped: the innermost frame. */
	get location(): SourceLocation | undefined {
		return this.trace[this.trace.length - 1]?.location
	}
}

function buildSourceContext(location: SourceLocation, sourceLine: string): string[] {
	const lineNumWidth = String(location.line).length
	const pad = ' '.repeat(lineNumWidth)
	const linePrefix = ` ${location.line} | `
	const emptyPrefix = ` ${pad} | `
	const pointer = `${' '.repeat(location.column - 1)}^`

	return [emptyPrefix, `${linePrefix}${sourceLine}`, `${emptyPrefix}${pointer}`]
}

/**
 * Format a parse error for display, with the offending source line.
 *
 * Example:
 * ```
 * error[ASMPARSE003]: expected Symbol, but received Newline (`\n`)
 *   --> src/util.asm:1:7
 *    |
 *  1 | global
 *    |       ^
 *    = trace: parse(util.asm:1:1) > global(util.asm:1:1) > Newline(util.asm:1:7)
 * ```
 */
export function formatParseError(error: ParseError, source: string): string {
	const header = `${error.def.severity}[${error.code}]: ${error.detail}`
	const location = error.location
	if (location === undefined) {
		return header
	}

	const lines = [header, `  --> ${location.file}:${location.line}:${location.column}`]
	const sourceLine = source.split('\n')[location.line - 1]
	if (sourceLine !== undefined) {
		lines.push(...buildSourceContext(location, sourceLine.replace(/\r$/, '')))
	}

	lines.push(`   = trace: ${formatTrace(error.trace)}`)
	const suggestion = formatSuggestion(error.def, error.args)
	if (suggestion !== undefined) {
		lines.push(`   = help: ${suggestion}`)
	}
	return lines.join('\n')
}
