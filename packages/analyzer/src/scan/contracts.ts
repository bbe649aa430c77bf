/**
 * Declaration scanner: finds sealed contracts in one module.
 */

import type { AnalysisHost, MethodSignature, ModuleUnit, TypeDeclaration } from '../core/host.ts'

/**
 * An abstract type with a confirmed discriminator method.
 */
export interface ContractCandidate {
	readonly declaration: TypeDeclaration
	readonly discriminator: string
}

/**
 * A discriminator is unexported, takes no parameters and returns nothing.
 */
export function isDiscriminator(method: MethodSignature): boolean {
	return !method.exported && method.params === 0 && method.results === 0
}

/**
 * First qualifying method of a declaration, in declaration order.
 */
export function findDiscriminator(declaration: TypeDeclaration): string | null {
	if (!declaration.abstract) return null
	const method = declaration.methods.find(isDiscriminator)
	return method !== undefined ? method.name : null
}

/**
 * Candidate contracts of a module, keyed by type name, in declaration order.
 */
export function scanContracts(
	module: ModuleUnit,
	host: AnalysisHost
): Map<string, ContractCandidate> {
	const candidates = new Map<string, ContractCandidate>()
	for (const declaration of host.declarations(module)) {
		if (declaration.kind !== 'type') continue
		const discriminator = findDiscriminator(declaration)
		if (discriminator === null) continue
		candidates.set(declaration.name, { declaration, discriminator })
	}
	return candidates
}
