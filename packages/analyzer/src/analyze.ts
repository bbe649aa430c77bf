/**
 * Run orchestration.
 *
 * Each module runs phase 1 (export facts) then phase 2 (check switches).
 * A module's task first waits for the tasks of every module it imports, so
 * all facts it can see are in the store before its switches are checked.
 * Independent branches of the graph interleave freely.
 */

import { type CheckOptions, checkModule } from './check/exhaustive.ts'
import { AnalysisContext, comparePositions, type Diagnostic } from './core/context.ts'
import type { AnalysisHost, ModuleUnit } from './core/host.ts'
import { FactStore, type VariantSetFact } from './facts/index.ts'
import { ModuleGraph } from './graph/module-graph.ts'
import { exportModuleFacts } from './scan/index.ts'

export interface AnalyzerOptions extends CheckOptions {
	/** Context to report into; a new one is created when omitted */
	context?: AnalysisContext
}

/**
 * What one module contributed to the run.
 */
export interface ModuleReport {
	readonly module: ModuleUnit
	/** Facts exported by this module */
	readonly facts: readonly VariantSetFact[]
	/** Diagnostics for this module's type switches, in source order */
	readonly diagnostics: readonly Diagnostic[]
}

export interface AnalysisResult {
	/** Whether no error diagnostics were reported */
	readonly succeeded: boolean
	readonly context: AnalysisContext
	readonly facts: FactStore
	/** Per-module reports in dependency order */
	readonly modules: readonly ModuleReport[]
}

/**
 * Both phases for one module. Facts of its dependencies must already be in `store`.
 */
export function analyzeModule(
	module: ModuleUnit,
	host: AnalysisHost,
	store: FactStore,
	options: CheckOptions = {}
): ModuleReport {
	const facts = exportModuleFacts(module, host, store)
	const diagnostics = checkModule(module, host, store, options).sort((a, b) =>
		comparePositions(a.position, b.position)
	)
	return { diagnostics, facts, module }
}

/**
 * Analyze every module of `host`.
 *
 * @throws {ModuleGraphError} If the modules import each other in a cycle
 * @throws {InvariantError} If the engine would export a contract's fact twice
 */
export async function analyze(
	host: AnalysisHost,
	options: AnalyzerOptions = {}
): Promise<AnalysisResult> {
	const graph = new ModuleGraph(host.modules)
	const order = graph.topologicalOrder()
	const store = new FactStore()
	const tasks = new Map<string, Promise<ModuleReport>>()

	const schedule = (module: ModuleUnit): Promise<ModuleReport> => {
		const existing = tasks.get(module.path)
		if (existing !== undefined) return existing

		const task = Promise.all(graph.dependencies(module).map(schedule)).then(() =>
			analyzeModule(module, host, store, options)
		)
		tasks.set(module.path, task)
		return task
	}

	const reports = await Promise.all(order.map(schedule))

	const context =
		options.context ?? new AnalysisContext((filename) => host.sourceText?.(filename))
	for (const report of reports) {
		context.addAll(report.diagnostics)
	}

	return {
		context,
		facts: store,
		modules: reports,
		succeeded: !context.hasErrors(),
	}
}
