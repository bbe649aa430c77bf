/**
 * Variant identifiers.
 *
 * A variant is recorded either by its bare type name (`Circle`) or, when only
 * the pointer form implements the discriminator, pointer-qualified
 * (`*Circle`). The canonical string form is the sort key, so `*` sorts
 * before letters.
 */

import type { TypeRef } from './host.ts'

const POINTER_MARKER = '*'

export class VariantName {
	readonly name: string
	readonly pointer: boolean

	constructor(name: string, pointer: boolean) {
		this.name = name
		this.pointer = pointer
	}

	static bare(name: string): VariantName {
		return new VariantName(name, false)
	}

	static pointerTo(name: string): VariantName {
		return new VariantName(name, true)
	}

	/** Parse a canonical form such as `*Circle`. */
	static parse(text: string): VariantName {
		return text.startsWith(POINTER_MARKER)
			? new VariantName(text.slice(POINTER_MARKER.length), true)
			: new VariantName(text, false)
	}

	/**
	 * Variant name for a resolved case-arm type: `T` or `*T` with T named in `module`.
	 * Returns null for any other shape.
	 */
	static fromType(type: TypeRef, module: string): VariantName | null {
		if (type.kind === 'named') {
			return type.module === module ? VariantName.bare(type.name) : null
		}
		if (type.kind === 'pointer' && type.elem.kind === 'named') {
			return type.elem.module === module ? VariantName.pointerTo(type.elem.name) : null
		}
		return null
	}

	equals(other: VariantName): boolean {
		return this.name === other.name && this.pointer === other.pointer
	}

	/** Qualify with the declaring module's short name: `shapes.*Circle`. */
	qualified(moduleName: string): string {
		return `${moduleName}.${this.toString()}`
	}

	toString(): string {
		return this.pointer ? `${POINTER_MARKER}${this.name}` : this.name
	}
}

/**
 * Code-unit order of canonical strings (not locale order).
 */
export function compareVariants(a: VariantName, b: VariantName): number {
	const left = a.toString()
	const right = b.toString()
	if (left < right) return -1
	if (left > right) return 1
	return 0
}

/**
 * Sort and deduplicate.
 */
export function sortVariants(variants: Iterable<VariantName>): VariantName[] {
	const byKey = new Map<string, VariantName>()
	for (const variant of variants) {
		byKey.set(variant.toString(), variant)
	}
	return [...byKey.values()].sort(compareVariants)
}
