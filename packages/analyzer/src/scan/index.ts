/**
 * Phase 1: discover sealed contracts of a module and export their facts.
 */

import type { AnalysisHost, ModuleUnit } from '../core/host.ts'
import { contractId, createFact, type FactStore, type VariantSetFact } from '../facts/index.ts'
import { scanContracts } from './contracts.ts'
import { buildVariantSet } from './variants.ts'

export { type ContractCandidate, findDiscriminator, isDiscriminator, scanContracts } from './contracts.ts'
export { buildVariantSet } from './variants.ts'

/**
 * Scan `module` and export one fact per sealed contract.
 * Returns the exported facts in declaration order.
 */
export function exportModuleFacts(
	module: ModuleUnit,
	host: AnalysisHost,
	store: FactStore
): VariantSetFact[] {
	const exported: VariantSetFact[] = []
	for (const [name, candidate] of scanContracts(module, host)) {
		const fact = createFact({
			contractName: name,
			discriminator: candidate.discriminator,
			moduleName: module.name,
			modulePath: module.path,
			variants: buildVariantSet(module, candidate.discriminator, host),
		})
		store.exportFact(contractId(module.path, name), fact)
		exported.push(fact)
	}
	return exported
}
