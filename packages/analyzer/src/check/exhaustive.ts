/**
 * Exhaustiveness checker (phase 2).
 */

import { AnalysisContext, type Diagnostic } from '../core/context.ts'
import type { AnalysisHost, ModuleUnit } from '../core/host.ts'
import { collectTypeSwitches } from '../core/walk.ts'
import type { VariantName } from '../core/variant.ts'
import type { FactStore, VariantSetFact } from '../facts/index.ts'
import { classifyDefaultArm, type DefaultArmRule } from './default-arm.ts'
import { type DispatchSite, matchDispatchSite } from './dispatch.ts'

export interface CheckOptions {
	defaultArmRule?: DefaultArmRule
}

/**
 * Variants of `fact` not in `handled`, in the fact's order.
 */
export function findMissingVariants(
	fact: VariantSetFact,
	handled: readonly VariantName[]
): VariantName[] {
	const handledKeys = new Set(handled.map((variant) => variant.toString()))
	return fact.variants.filter((variant) => !handledKeys.has(variant.toString()))
}

/**
 * Missing variants qualified with the contract module's short name.
 */
export function formatMissing(fact: VariantSetFact, missing: readonly VariantName[]): string[] {
	return missing.map((variant) => variant.qualified(fact.moduleName))
}

/**
 * Check one dispatch site. Returns the reported diagnostic, if any.
 */
export function checkDispatchSite(
	site: DispatchSite,
	host: AnalysisHost,
	context: AnalysisContext,
	options: CheckOptions = {}
): Diagnostic | null {
	if (site.defaultArm !== null) {
		const verdict = classifyDefaultArm(site.defaultArm, host, options.defaultArmRule)
		if (verdict === 'intentional') return null
	}

	const missing = findMissingVariants(site.fact, site.handled)
	if (missing.length === 0) return null

	return context.emit('SCCHECK001', site.statement.position, {
		contract: site.fact.contractName,
		missing: formatMissing(site.fact, missing),
	})
}

/**
 * Check every type switch of `module` against the facts visible in `store`.
 * Diagnostics are reported into a module-local context and returned.
 */
export function checkModule(
	module: ModuleUnit,
	host: AnalysisHost,
	store: FactStore,
	options: CheckOptions = {}
): Diagnostic[] {
	const context = new AnalysisContext()
	for (const statement of collectTypeSwitches(host.declarations(module))) {
		const site = matchDispatchSite(statement, host, store)
		if (site === null) continue
		checkDispatchSite(site, host, context, options)
	}
	return [...context.getDiagnostics()]
}
