/**
 * Dispatch-site matcher: pairs type switches with the facts of the sealed
 * contract they switch on.
 */

import type { AnalysisHost, TypeCaseClause, TypeSwitchStatement } from '../core/host.ts'
import { isAbstractNamed } from '../core/types.ts'
import { VariantName } from '../core/variant.ts'
import { contractIdOf, type FactStore, type VariantSetFact } from '../facts/index.ts'

/**
 * A type switch over a sealed contract.
 */
export interface DispatchSite {
	readonly statement: TypeSwitchStatement
	readonly fact: VariantSetFact
	/** Case-arm types that resolved to variants of the contract's module */
	readonly handled: readonly VariantName[]
	readonly defaultArm: TypeCaseClause | null
}

/**
 * The catch-all clause, if any.
 */
export function findDefaultArm(statement: TypeSwitchStatement): TypeCaseClause | null {
	return statement.clauses.find((clause) => clause.types === null) ?? null
}

/**
 * Resolve every case-arm type to a variant name of `fact`'s module.
 * Arms that do not resolve, or resolve elsewhere, are dropped.
 */
export function collectHandled(
	statement: TypeSwitchStatement,
	fact: VariantSetFact,
	host: AnalysisHost
): VariantName[] {
	const handled: VariantName[] = []
	for (const clause of statement.clauses) {
		for (const caseType of clause.types ?? []) {
			if (caseType.kind === 'nil') continue
			const type = host.resolveType(caseType)
			if (type === undefined) continue
			const variant = VariantName.fromType(type, fact.modulePath)
			if (variant !== null) handled.push(variant)
		}
	}
	return handled
}

/**
 * Build the dispatch site for `statement`, or null when the switch is not over
 * a sealed contract with a known fact.
 */
export function matchDispatchSite(
	statement: TypeSwitchStatement,
	host: AnalysisHost,
	store: FactStore
): DispatchSite | null {
	const subjectType = host.resolveType(statement.subject)
	if (subjectType === undefined) return null
	if (!isAbstractNamed(subjectType)) return null

	const fact = store.importFact(contractIdOf(subjectType))
	if (fact === undefined) return null

	return {
		defaultArm: findDefaultArm(statement),
		fact,
		handled: collectHandled(statement, fact, host),
		statement,
	}
}
