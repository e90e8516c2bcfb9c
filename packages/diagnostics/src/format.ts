import type { DiagnosticArgs, DiagnosticDef } from './types.ts'

/**
 * Replace `{key}` placeholders with values from `args`.
 * Unknown keys are left in place so a missing argument stays visible.
 */
export function interpolateMessage(message: string, args?: DiagnosticArgs): string {
	if (!args) return message
	return message.replace(/\{(\w+)\}/g, (placeholder, key: string) => {
		const value = args[key]
		return value !== undefined ? String(value) : placeholder
	})
}

/**
 * One-line form used by the CLI logger: `[ASMCLI001] path not found: a.asm`.
 */
export function formatDiagnosticLine(def: DiagnosticDef, args?: DiagnosticArgs): string {
	return `[${def.code}] ${interpolateMessage(def.message, args)}`
}

/**
 * Suggestion text for a definition, with arguments applied.
 */
export function formatSuggestion(def: DiagnosticDef, args?: DiagnosticArgs): string | undefined {
	return def.suggestion === undefined ? undefined : interpolateMessage(def.suggestion, args)
}
