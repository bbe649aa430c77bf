/**
 * CLI diagnostic definitions.
 *
 * Error code format: SCCLI<NUMBER>
 * - SCCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (SCCLI001-099)
// =============================================================================

export const SCCLI001: DiagnosticDef = {
	code: 'SCCLI001',
	description: "sealcheck couldn't find anything at this path.",
	message: 'path not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the directory exists.',
}

export const SCCLI002: DiagnosticDef = {
	code: 'SCCLI002',
	description: "The path exists but sealcheck can't read it.",
	message: 'cannot read {path}: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this path.',
}

export const SCCLI003: DiagnosticDef = {
	code: 'SCCLI003',
	description: 'The directory holds no .seal source files.',
	message: 'no source files under {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Point sealcheck at the workspace root that contains your module directories.',
}

export const SCCLI004: DiagnosticDef = {
	code: 'SCCLI004',
	description: "sealcheck doesn't recognize this option value.",
	message: 'unknown {option} "{value}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use one of: {choices}.',
}

export const SCCLI005: DiagnosticDef = {
	code: 'SCCLI005',
	description: "The analysis stopped on an internal inconsistency. This shouldn't happen!",
	message: 'analysis aborted: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'This is an analyzer bug. Please report it along with the sources that trigger it.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	SCCLI001,
	SCCLI002,
	SCCLI003,
	SCCLI004,
	SCCLI005,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
