import type { AnalysisContext } from '@sealcheck/analyzer'
import type { SourceFile } from '../core/source.ts'
import { createSemantics, LineIndex, SealGrammar } from '../grammar/index.ts'

export interface ParseResult {
	succeeded: boolean
	file?: SourceFile
}

/**
 * Parse one `.seal` file. A syntax error is reported into `context` as
 * SCPARSE001 at the rightmost position the grammar reached.
 */
export function parseSource(
	source: string,
	filename: string,
	context?: AnalysisContext
): ParseResult {
	const matchResult = SealGrammar.match(source)

	if (matchResult.failed()) {
		const { line, column } = new LineIndex().at(source, matchResult.getRightmostFailurePosition())
		context?.emit(
			'SCPARSE001',
			{ column, filename, line },
			{ detail: `expected ${matchResult.getExpectedText()}` }
		)
		return { succeeded: false }
	}

	const file: SourceFile = createSemantics(filename)(matchResult)['toFile']()
	return { file, succeeded: true }
}
