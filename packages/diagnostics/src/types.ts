/**
 * How a diagnostic affects a run: errors fail it, warnings are reported and
 * the run continues.
 */
export const DiagnosticSeverity = {
	Error: 'error',
	Warning: 'warning',
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/**
 * A catalog entry. `message` and `suggestion` are templates filled by
 * `interpolateMessage`.
 */
export interface DiagnosticDef {
	/** Stable code shown to users, e.g. `ASMPARSE003` */
	readonly code: string
	readonly severity: DiagnosticSeverity
	readonly message: string
	/** Longer explanation for documentation */
	readonly description: string
	readonly suggestion?: string
}

/** Values substituted for `{name}` placeholders. */
export type DiagnosticArgs = Readonly<Record<string, string | number>>
