/**
 * Variant set builder: which concrete types of the contract's module
 * implement its discriminator.
 */

import type { AnalysisHost, ModuleUnit } from '../core/host.ts'
import { namedType, pointerTo } from '../core/types.ts'
import { sortVariants, VariantName } from '../core/variant.ts'

const NO_ARGS = { params: 0, results: 0 } as const

/**
 * Sorted variants of a discriminator within `module`.
 *
 * A type whose value form implements the method is recorded bare; one that
 * only implements it through its pointer form is recorded pointer-qualified.
 */
export function buildVariantSet(
	module: ModuleUnit,
	discriminator: string,
	host: AnalysisHost
): VariantName[] {
	const variants: VariantName[] = []
	for (const declaration of host.declarations(module)) {
		if (declaration.kind !== 'type' || declaration.abstract) continue

		const bare = namedType(module.path, declaration.name)
		if (host.implementsMethod(bare, discriminator, NO_ARGS)) {
			variants.push(VariantName.bare(declaration.name))
		} else if (host.implementsMethod(pointerTo(bare), discriminator, NO_ARGS)) {
			variants.push(VariantName.pointerTo(declaration.name))
		}
	}
	return sortVariants(variants)
}
