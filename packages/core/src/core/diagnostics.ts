/**
 * Re-export the diagnostic definitions the core raises.
 */

export {
	ASMDOC001,
	ASMLEX001,
	ASMPARSE001,
	ASMPARSE002,
	ASMPARSE003,
	ASMPARSE004,
	type DiagnosticArgs,
	type DiagnosticDef,
	formatSuggestion,
	interpolateMessage,
} from '@asmdoc/diagnostics'
