/**
 * Parsing module.
 * Front ends share the `Syntax` contract; NASM is the only one so far.
 */

export { NasmParser, nasm } from './nasm.ts'
export { type ParseOptions, type ParseResult, parse } from './parser.ts'
export type { Syntax } from './syntax.ts'
