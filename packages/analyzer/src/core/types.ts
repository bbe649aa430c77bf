/**
 * Constructors and predicates for TypeRef values.
 */

import type { BasicType, NamedType, PointerType, TypeRef } from './host.ts'

/** Module path of built-in types such as `error`. */
export const UNIVERSE_MODULE = ''

export function namedType(module: string, name: string, abstract = false): NamedType {
	return { abstract, kind: 'named', module, name }
}

export function pointerTo(elem: TypeRef): PointerType {
	return { elem, kind: 'pointer' }
}

export function basicType(name: string): BasicType {
	return { kind: 'basic', name }
}

export function isAbstractNamed(type: TypeRef): type is NamedType {
	return type.kind === 'named' && type.abstract
}

/**
 * Named element of `*T`, or null for anything else.
 */
export function pointerElemNamed(type: TypeRef): NamedType | null {
	if (type.kind !== 'pointer') return null
	return type.elem.kind === 'named' ? type.elem : null
}

/**
 * Structural equality of two types.
 */
export function sameType(a: TypeRef, b: TypeRef): boolean {
	switch (a.kind) {
		case 'named':
			return b.kind === 'named' && a.module === b.module && a.name === b.name
		case 'pointer':
			return b.kind === 'pointer' && sameType(a.elem, b.elem)
		case 'basic':
			return b.kind === 'basic' && a.name === b.name
	}
}

/**
 * Human-readable type string, with module paths for named types.
 */
export function typeString(type: TypeRef): string {
	switch (type.kind) {
		case 'named':
			return type.module === UNIVERSE_MODULE ? type.name : `${type.module}.${type.name}`
		case 'pointer':
			return `*${typeString(type.elem)}`
		case 'basic':
			return type.name
	}
}
