import { args, BaseCommand, flags } from '@adonisjs/ace'
import {
	type AnalysisResult,
	analyze,
	DEFAULT_ARM_RULES,
	type DefaultArmRule,
	isDefaultArmRule,
} from '@sealcheck/analyzer'
import { type LoadedWorkspace, loadWorkspace } from '@sealcheck/frontend'
import {
	formatAbort,
	formatFact,
	formatLoadError,
	formatNoSources,
	formatUnknownOption,
	isLoadError,
	isOutputFormat,
	type JsonReport,
	OUTPUT_FORMATS,
	type OutputFormat,
	toJsonDiagnostic,
	toJsonFact,
} from '../utils.ts'

interface CheckSettings {
	format: OutputFormat
	defaultArmRule: DefaultArmRule
}

export default class CheckCommand extends BaseCommand {
	static override commandName = 'check'
	static override description = 'Check type switches over sealed contracts for missing cases'

	@args.spread({
		description: 'Workspace roots or single .seal files (default: current directory)',
		required: false,
	})
	declare paths?: string[]

	@flags.string({
		alias: 'f',
		default: 'text',
		description: 'Output format: text (default) or json',
	})
	declare format: string

	@flags.string({
		default: 'last-statement',
		description: 'Which default-arm statement decides a safety guard: last-statement or sole-statement',
	})
	declare defaultRule: string

	@flags.boolean({ description: 'Print the sealed contracts found before the diagnostics' })
	declare facts: boolean

	@flags.boolean({ description: 'One line per diagnostic' })
	declare compact: boolean

	private readSettings(): CheckSettings | null {
		const { defaultRule, format } = this
		if (!isOutputFormat(format)) {
			this.logger.error(formatUnknownOption('format', format, OUTPUT_FORMATS))
			return null
		}
		if (!isDefaultArmRule(defaultRule)) {
			this.logger.error(formatUnknownOption('default rule', defaultRule, DEFAULT_ARM_RULES))
			return null
		}
		return { defaultArmRule: defaultRule, format }
	}

	private async load(root: string): Promise<LoadedWorkspace | null> {
		try {
			const loaded = await loadWorkspace(root)
			if (loaded.files.length === 0) {
				this.logger.error(formatNoSources(root))
				return null
			}
			return loaded
		} catch (error: unknown) {
			if (!isLoadError(error)) throw error
			this.logger.error(formatLoadError(error))
			return null
		}
	}

	private async analyzeWorkspace(
		loaded: LoadedWorkspace,
		settings: CheckSettings
	): Promise<AnalysisResult | null> {
		try {
			return await analyze(loaded.host, {
				context: loaded.workspace.context,
				defaultArmRule: settings.defaultArmRule,
			})
		} catch (error: unknown) {
			const message = formatAbort(error)
			this.printDiagnostics(loaded.workspace.context.formatAllDiagnostics(this.compact))
			this.logger.error(message)
			return null
		}
	}

	private printDiagnostics(text: string): void {
		if (text !== '') this.logger.log(text)
	}

	private printText(root: string, result: AnalysisResult): void {
		if (this.facts) {
			for (const [, fact] of result.facts) {
				this.logger.info(formatFact(fact))
			}
		}

		this.printDiagnostics(result.context.formatAllDiagnostics(this.compact))

		const errors = result.context.getErrorCount()
		if (errors === 0) {
			this.logger.success(`${root}: no missing cases`)
		} else {
			this.logger.error(`${root}: ${errors} error${errors === 1 ? '' : 's'}`)
		}
	}

	private toJson(root: string, result: AnalysisResult): JsonReport {
		const report: JsonReport = {
			diagnostics: result.context.getDiagnostics().map(toJsonDiagnostic),
			path: root,
			succeeded: result.succeeded,
		}
		if (this.facts) {
			report.facts = [...result.facts].map(([, fact]) => toJsonFact(fact))
		}
		return report
	}

	override async run(): Promise<void> {
		const settings = this.readSettings()
		if (settings === null) {
			this.exitCode = 1
			return
		}

		const reports: JsonReport[] = []
		const roots = this.paths !== undefined && this.paths.length > 0 ? this.paths : ['.']

		for (const root of roots) {
			const loaded = await this.load(root)
			const result = loaded === null ? null : await this.analyzeWorkspace(loaded, settings)
			if (result === null) {
				this.exitCode = 1
				continue
			}
			if (!result.succeeded) this.exitCode = 1

			if (settings.format === 'json') {
				reports.push(this.toJson(root, result))
			} else {
				this.printText(root, result)
			}
		}

		if (settings.format === 'json') {
			console.log(JSON.stringify(reports, null, 2))
		}
	}
}
