/**
 * Variant-set facts: what phase 1 learns about a sealed contract.
 */

import type { NamedType } from '../core/host.ts'
import { sortVariants, type VariantName } from '../core/variant.ts'

/**
 * Branded contract identity: `<module path>.<type name>`.
 */
export type ContractId = string & { readonly __brand: 'ContractId' }

export function contractId(modulePath: string, name: string): ContractId {
	return `${modulePath}.${name}` as ContractId
}

export function contractIdOf(type: NamedType): ContractId {
	return contractId(type.module, type.name)
}

/**
 * Immutable record of a sealed contract.
 */
export interface VariantSetFact {
	readonly contract: ContractId
	/** Short name of the contract type (`Shape`) */
	readonly contractName: string
	/** Path of the declaring module; every variant is declared there */
	readonly modulePath: string
	/** Short name of the declaring module, used to qualify variants */
	readonly moduleName: string
	/** Name of the discriminator method */
	readonly discriminator: string
	/** Unique, sorted by canonical string */
	readonly variants: readonly VariantName[]
}

export interface VariantSetFactInit {
	readonly modulePath: string
	readonly moduleName: string
	readonly contractName: string
	readonly discriminator: string
	readonly variants: Iterable<VariantName>
}

/**
 * Build a frozen fact, normalising the variant list.
 */
export function createFact(init: VariantSetFactInit): VariantSetFact {
	return Object.freeze({
		contract: contractId(init.modulePath, init.contractName),
		contractName: init.contractName,
		discriminator: init.discriminator,
		moduleName: init.moduleName,
		modulePath: init.modulePath,
		variants: Object.freeze(sortVariants(init.variants)),
	})
}

/**
 * One-line rendering: `{isShape [*Circle *Rectangle]}`.
 */
export function describeFact(fact: VariantSetFact): string {
	return `{${fact.discriminator} [${fact.variants.join(' ')}]}`
}
