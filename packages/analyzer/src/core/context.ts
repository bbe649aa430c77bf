/**
 * Diagnostic collection for one analysis run.
 * Every phase, the source loader included, reports into the same context.
 */

import {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
	severityLabel,
} from './diagnostics.ts'
import type { SourcePosition } from './host.ts'

/**
 * A diagnostic message with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	readonly position: SourcePosition
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
}

/**
 * Looks up the text of a source file for excerpts.
 */
export type SourceLookup = (filename: string) => string | undefined

/**
 * Source-order comparison: file, then line, then column.
 */
export function comparePositions(a: SourcePosition, b: SourcePosition): number {
	if (a.filename !== b.filename) return a.filename < b.filename ? -1 : 1
	if (a.line !== b.line) return a.line - b.line
	return a.column - b.column
}

export class AnalysisContext {
	private readonly diagnostics: Diagnostic[] = []

	private errorCount = 0

	private readonly lookupSource: SourceLookup

	constructor(lookupSource: SourceLookup = () => undefined) {
		this.lookupSource = lookupSource
	}

	/**
	 * Emit a diagnostic by code at a source position.
	 */
	emit(code: DiagnosticCode, position: SourcePosition, args?: DiagnosticArgs): Diagnostic {
		const def = getDiagnostic(code)
		const diagnostic: Diagnostic = {
			def,
			message: interpolateMessage(def.message, args),
			position,
			...(args ? { args } : {}),
		}
		this.add(diagnostic)
		return diagnostic
	}

	/**
	 * Append diagnostics produced elsewhere (for example by a per-module pass).
	 */
	addAll(diagnostics: Iterable<Diagnostic>): void {
		for (const diagnostic of diagnostics) {
			this.add(diagnostic)
		}
	}

	private add(diagnostic: Diagnostic): void {
		this.diagnostics.push(diagnostic)
		if (diagnostic.def.severity === DiagnosticSeverity.Error) {
			this.errorCount++
		}
	}

	// ===========================================================================
	// QUERY METHODS
	// ===========================================================================

	hasErrors(): boolean {
		return this.errorCount > 0
	}

	getErrorCount(): number {
		return this.errorCount
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}

	getErrors(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Error)
	}

	getSourceLine(filename: string, line: number): string | undefined {
		const source = this.lookupSource(filename)
		if (source === undefined) return undefined
		return source.split('\n')[line - 1]
	}

	// ===========================================================================
	// FORMATTING
	// ===========================================================================

	private buildSourceContext(
		diagnostic: Diagnostic,
		sourceLine: string
	): { emptyPrefix: string; lines: string[] } {
		const { line, column } = diagnostic.position
		const pad = ' '.repeat(String(line).length)
		const linePrefix = ` ${line} | `
		const emptyPrefix = ` ${pad} | `
		const pointer = `${' '.repeat(Math.max(0, column - 1))}^`

		return {
			emptyPrefix,
			lines: [emptyPrefix, `${linePrefix}${sourceLine}`, `${emptyPrefix}${pointer}`],
		}
	}

	/**
	 * `file:line:column: message`, the shape editors and linters understand.
	 */
	formatCompact(diagnostic: Diagnostic): string {
		const { filename, line, column } = diagnostic.position
		return `${filename}:${line}:${column}: ${diagnostic.message}`
	}

	/**
	 * Format a diagnostic for display (Rust-style output).
	 *
	 * Example:
	 * ```
	 * error[SCCHECK001]: missing cases in type switch on Result: union.*Error
	 *   --> union/union.seal:58:2
	 *    |
	 * 58 |     switch r.(type) {
	 *    |     ^
	 *    |
	 *    = help: Add a case for each missing type, ...
	 * ```
	 */
	formatDiagnostic(diagnostic: Diagnostic): string {
		const { def, position } = diagnostic
		const header = `${severityLabel(def.severity)}[${def.code}]: ${diagnostic.message}`
		const location = `  --> ${position.filename}:${position.line}:${position.column}`

		const sourceLine = this.getSourceLine(position.filename, position.line)
		if (sourceLine === undefined) {
			return `${header}\n${location}`
		}

		const { emptyPrefix, lines: contextLines } = this.buildSourceContext(diagnostic, sourceLine)
		const lines = [header, location, ...contextLines]

		if (def.suggestion) {
			const suggestion = interpolateMessage(def.suggestion, diagnostic.args)
			lines.push(emptyPrefix, `   = help: ${suggestion}`)
		}

		return lines.join('\n')
	}

	formatAllDiagnostics(compact = false): string {
		if (compact) return this.diagnostics.map((d) => this.formatCompact(d)).join('\n')
		return this.diagnostics.map((d) => this.formatDiagnostic(d)).join('\n\n')
	}
}
