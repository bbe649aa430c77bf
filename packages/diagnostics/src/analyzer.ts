/**
 * Analyzer and source-loading diagnostic definitions.
 *
 * Error code format: SC<PHASE><NUMBER>
 * - SCPARSE: Source parse errors (001-099)
 * - SCLOAD: Workspace loading errors (001-099)
 * - SCCHECK: Exhaustiveness checker errors (001-049), warnings (050-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// PARSER ERRORS (SCPARSE001-099)
// =============================================================================

export const SCPARSE001: DiagnosticDef = {
	code: 'SCPARSE001',
	description: "sealcheck couldn't understand this part of the source file.",
	message: 'syntax error: {detail}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check for typos, missing braces or unsupported syntax.',
}

// =============================================================================
// LOAD ERRORS (SCLOAD001-099)
// =============================================================================

export const SCLOAD001: DiagnosticDef = {
	code: 'SCLOAD001',
	description: 'Every source file in a module directory must declare the same package name.',
	message: 'package {found} does not match package {expected} of module "{module}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Rename the package clause to `package {expected}`, or move the file.',
}

export const SCLOAD002: DiagnosticDef = {
	code: 'SCLOAD002',
	description: 'This import names a module that is neither in the workspace nor a known library.',
	message: 'unknown module "{path}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check the import path; module paths are directories relative to the workspace root.',
}

export const SCLOAD003: DiagnosticDef = {
	code: 'SCLOAD003',
	description: 'Two top-level declarations in the same module share a name.',
	message: '{name} redeclared in module "{module}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Rename one of the declarations.',
}

export const SCLOAD004: DiagnosticDef = {
	code: 'SCLOAD004',
	description: 'Modules import each other in a loop, so there is no order to analyze them in.',
	message: 'import cycle: {cycle}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Break the cycle by moving the shared declarations into their own module.',
}

// =============================================================================
// CHECKER ERRORS (SCCHECK001-049)
// =============================================================================

export const SCCHECK001: DiagnosticDef = {
	code: 'SCCHECK001',
	description:
		'The switched-on type is sealed: only the types listed in its module implement it, and this type switch does not handle all of them.',
	message: 'missing cases in type switch on {contract}: {missing}',
	severity: DiagnosticSeverity.Error,
	suggestion:
		'Add a case for each missing type, or end the default arm with a panic to keep the check.',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all analyzer diagnostics.
 */
export const ANALYZER_DIAGNOSTICS = {
	// Checker errors
	SCCHECK001,
	// Load errors
	SCLOAD001,
	SCLOAD002,
	SCLOAD003,
	SCLOAD004,
	// Parser errors
	SCPARSE001,
} as const

/**
 * All valid analyzer diagnostic codes.
 */
export type AnalyzerDiagnosticCode = keyof typeof ANALYZER_DIAGNOSTICS
