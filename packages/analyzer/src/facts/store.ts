/**
 * The run-wide fact store.
 *
 * Facts are exported once per contract by the declaring module's scan and
 * imported by every dispatch site that switches on the contract. Nothing is
 * invalidated within a run.
 */

import { InvariantError } from '../core/errors.ts'
import type { ContractId, VariantSetFact } from './types.ts'

export class FactStore {
	private readonly facts = new Map<ContractId, VariantSetFact>()

	/**
	 * Insert a fact. A second export for the same contract is an engine bug.
	 */
	exportFact(contract: ContractId, fact: VariantSetFact): void {
		if (this.facts.has(contract)) {
			throw new InvariantError(`fact for ${contract} exported twice`)
		}
		if (fact.contract !== contract) {
			throw new InvariantError(`fact for ${fact.contract} exported under ${contract}`)
		}
		this.facts.set(contract, fact)
	}

	importFact(contract: ContractId): VariantSetFact | undefined {
		return this.facts.get(contract)
	}

	has(contract: ContractId): boolean {
		return this.facts.has(contract)
	}

	count(): number {
		return this.facts.size
	}

	/** Facts in export order. */
	*[Symbol.iterator](): Generator<[ContractId, VariantSetFact]> {
		yield* this.facts
	}
}
