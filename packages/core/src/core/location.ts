import { basename } from 'node:path'

/**
 * A point in a source file. Line and column are 1-based.
 */
export interface SourceLocation {
	readonly file: string
	readonly line: number
	readonly column: number
}

/**
 * Tracks line and column while characters are consumed in order.
 * Columns count Unicode code points, so a character outside the BMP is one column.
 */
export class LocationCursor {
	private line = 1
	private column = 1

	constructor(private readonly file: string) {}

	current(): SourceLocation {
		return { column: this.column, file: this.file, line: this.line }
	}

	advance(text: string): void {
		for (const char of text) {
			if (char === '\n') {
				this.line++
				this.column = 1
			} else {
				this.column++
			}
		}
	}
}

/** `file.asm:3:7`, using the file's base name. */
export function formatLocation(location: SourceLocation): string {
	return `${basename(location.file)}:${location.line}:${location.column}`
}
