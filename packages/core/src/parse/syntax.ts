import type { AssemblyFile } from '../model/file.ts'

/**
 * An assembly front end. Implementations turn one file's source into a model,
 * throwing `ParseError` on the first failure.
 */
export interface Syntax {
	readonly name: string
	parse(source: string, filename: string): AssemblyFile
}
