/**
 * @sealcheck/diagnostics
 *
 * Shared diagnostic types and definitions for sealcheck packages.
 */

export {
	ANALYZER_DIAGNOSTICS,
	type AnalyzerDiagnosticCode,
	SCCHECK001,
	SCLOAD001,
	SCLOAD002,
	SCLOAD003,
	SCLOAD004,
	SCPARSE001,
} from './analyzer.ts'
export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	SCCLI001,
	SCCLI002,
	SCCLI003,
	SCCLI004,
	SCCLI005,
} from './cli.ts'
export { interpolateMessage } from './interpolate.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	type DiagnosticSeverity as DiagnosticSeverityType,
	severityLabel,
} from './types.ts'

import { ANALYZER_DIAGNOSTICS } from './analyzer.ts'
import { CLI_DIAGNOSTICS } from './cli.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...ANALYZER_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}
