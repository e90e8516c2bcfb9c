/**
 * CLI diagnostic definitions.
 *
 * Error code format: ASMCLI<NUMBER>
 * - ASMCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (ASMCLI001-099)
// =============================================================================

export const ASMCLI001: DiagnosticDef = {
	code: 'ASMCLI001',
	description: "asmdoc couldn't find a file or directory at this path.",
	message: 'path not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure it exists.',
}

export const ASMCLI002: DiagnosticDef = {
	code: 'ASMCLI002',
	description: "The file exists but asmdoc can't read it as UTF-8 text.",
	message: 'cannot read {path}: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check read permissions and that the file is UTF-8 encoded.',
}

export const ASMCLI003: DiagnosticDef = {
	code: 'ASMCLI003',
	description: "asmdoc couldn't save a documentation file.",
	message: 'cannot write {path}: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have write permission for the output directory.',
}

export const ASMCLI004: DiagnosticDef = {
	code: 'ASMCLI004',
	description: 'The output path already exists and is not a directory.',
	message: 'output path is not a directory: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass a directory to `--output`, or a path that does not exist yet.',
}

export const ASMCLI005: DiagnosticDef = {
	code: 'ASMCLI005',
	description: 'None of the given paths contain .asm or .nasm files.',
	message: 'no assembly files found',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass .asm/.nasm files or directories that contain them.',
}

export const ASMCLI006: DiagnosticDef = {
	code: 'ASMCLI006',
	description: 'Two input files would be documented into the same output file.',
	message: '{first} and {second} both map to {output}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Document the files in separate runs with different output directories.',
}

export const ASMCLI007: DiagnosticDef = {
	code: 'ASMCLI007',
	description: 'One or more files failed to parse, so no documentation was written.',
	message: '{count} file(s) failed to parse',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Fix the errors above, or pass `--keep-going` to document the other files.',
}
