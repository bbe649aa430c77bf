/**
 * Re-export diagnostic types and definitions from the shared package.
 */

export {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
	severityLabel,
} from '@sealcheck/diagnostics'
