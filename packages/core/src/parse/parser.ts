import { ParseError } from '../core/errors.ts'
import type { AssemblyFile } from '../model/file.ts'
import { nasm } from './nasm.ts'
import type { Syntax } from './syntax.ts'

export interface ParseOptions {
	/** Path to the source file (for locations and error messages) */
	filename?: string
	/** Front end to parse with; defaults to NASM */
	syntax?: Syntax
}

export type ParseResult =
	| { readonly succeeded: true; readonly file: AssemblyFile }
	| { readonly succeeded: false; readonly error: ParseError }

/**
 * Parse one assembly file. Parsing is all-or-nothing: a failure yields the
 * error and no partial model.
 */
export function parse(source: string, options: ParseOptions = {}): ParseResult {
	const syntax = options.syntax ?? nasm
	try {
		return { file: syntax.parse(source, options.filename ?? '<input>'), succeeded: true }
	} catch (error: unknown) {
		if (error instanceof ParseError) {
			return { error, succeeded: false }
		}
		throw error
	}
}
