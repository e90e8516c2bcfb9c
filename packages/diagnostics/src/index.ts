/**
 * @asmdoc/diagnostics
 *
 * Diagnostic catalog shared by the asmdoc core and CLI.
 */

export {
	ASMDOC001,
	ASMLEX001,
	ASMPARSE001,
	ASMPARSE002,
	ASMPARSE003,
	ASMPARSE004,
	ASMPROJ050,
} from './assembly.ts'
export { ASMCLI001, ASMCLI002, ASMCLI003, ASMCLI004, ASMCLI005, ASMCLI006, ASMCLI007 } from './cli.ts'
export { formatDiagnosticLine, formatSuggestion, interpolateMessage } from './format.ts'
export { type DiagnosticArgs, type DiagnosticDef, DiagnosticSeverity } from './types.ts'
