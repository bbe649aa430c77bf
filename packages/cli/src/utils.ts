import {
	type Diagnostic,
	describeFact,
	InvariantError,
	ModuleGraphError,
	type VariantSetFact,
} from '@sealcheck/analyzer'
import {
	type DiagnosticArgs,
	type DiagnosticDef,
	interpolateMessage,
	SCCLI001,
	SCCLI002,
	SCCLI003,
	SCCLI004,
	SCCLI005,
	severityLabel,
} from '@sealcheck/diagnostics'
import { LoadError } from '@sealcheck/frontend'

export type OutputFormat = 'text' | 'json'

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json']

export function isOutputFormat(value: string): value is OutputFormat {
	return value === 'text' || value === 'json'
}

function formatCliDiagnostic(def: DiagnosticDef, args: DiagnosticArgs): string {
	return `[${def.code}] ${interpolateMessage(def.message, args)}`
}

export function formatLoadError(error: LoadError): string {
	if (error.code === 'ENOENT') {
		return formatCliDiagnostic(SCCLI001, { path: error.path })
	}
	return formatCliDiagnostic(SCCLI002, { path: error.path, reason: error.message })
}

export function formatNoSources(path: string): string {
	return formatCliDiagnostic(SCCLI003, { path })
}

export function formatUnknownOption(
	option: string,
	value: string,
	choices: readonly string[]
): string {
	const help = interpolateMessage(SCCLI004.suggestion ?? '', { choices: choices.join(', ') })
	return `${formatCliDiagnostic(SCCLI004, { option, value })}. ${help}`
}

/**
 * Message for an error that stopped the analysis. Only the engine's own
 * failures are expected here; anything else is rethrown.
 */
export function formatAbort(error: unknown): string {
	if (error instanceof InvariantError || error instanceof ModuleGraphError) {
		return formatCliDiagnostic(SCCLI005, { reason: error.message })
	}
	throw error
}

export function isLoadError(error: unknown): error is LoadError {
	return error instanceof LoadError
}

/**
 * `Shape: {isShape [*Circle *Square]}`
 */
export function formatFact(fact: VariantSetFact): string {
	return `${fact.contractName}: ${describeFact(fact)}`
}

export interface JsonDiagnostic {
	code: string
	severity: string
	message: string
	filename: string
	line: number
	column: number
}

export interface JsonFact {
	contract: string
	discriminator: string
	variants: string[]
}

export interface JsonReport {
	path: string
	succeeded: boolean
	diagnostics: JsonDiagnostic[]
	facts?: JsonFact[]
}

export function toJsonDiagnostic(diagnostic: Diagnostic): JsonDiagnostic {
	const { column, filename, line } = diagnostic.position
	return {
		code: diagnostic.def.code,
		column,
		filename,
		line,
		message: diagnostic.message,
		severity: severityLabel(diagnostic.def.severity),
	}
}

export function toJsonFact(fact: VariantSetFact): JsonFact {
	return {
		contract: fact.contract,
		discriminator: fact.discriminator,
		variants: fact.variants.map((variant) => variant.toString()),
	}
}
