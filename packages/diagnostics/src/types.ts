/**
 * Diagnostic severity levels.
 */
export const DiagnosticSeverity = {
	Error: 0,
	Note: 2,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

const SEVERITY_LABELS: Record<DiagnosticSeverity, string> = {
	[DiagnosticSeverity.Error]: 'error',
	[DiagnosticSeverity.Note]: 'note',
	[DiagnosticSeverity.Warning]: 'warning',
}

/**
 * Lower-case label used when rendering a diagnostic header.
 */
export function severityLabel(severity: DiagnosticSeverity): string {
	return SEVERITY_LABELS[severity]
}

/**
 * Diagnostic definition in the catalog.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly severity: DiagnosticSeverity
	/** Message template; `{name}` placeholders are filled from DiagnosticArgs */
	readonly message: string
	readonly description: string
	readonly suggestion?: string
}

/**
 * Template arguments for diagnostic messages.
 * List values are rendered comma-separated, in the order given.
 */
export type DiagnosticArgs = Readonly<Record<string, string | number | readonly string[]>>
