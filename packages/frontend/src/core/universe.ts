/**
 * Predeclared types and functions, visible in every module.
 */

import {
	basicType,
	type Capability,
	namedType,
	type NamedType,
	type TypeRef,
	UNIVERSE_MODULE,
} from '@sealcheck/analyzer'

export const ERROR_TYPE: NamedType = namedType(UNIVERSE_MODULE, 'error', true)
export const ANY_TYPE: NamedType = namedType(UNIVERSE_MODULE, 'any', true)

export const STRING_TYPE = basicType('string')
export const INT_TYPE = basicType('int')
export const FLOAT_TYPE = basicType('float64')
export const BOOL_TYPE = basicType('bool')
export const UNTYPED_NIL = basicType('untyped nil')

export const ERROR_CAPABILITY: Capability = {
	methods: [
		{ exported: true, name: 'Error', params: 0, resultTypes: [STRING_TYPE], results: 1 },
	],
	name: 'error',
}

const UNIVERSE_TYPES: ReadonlyMap<string, TypeRef> = new Map<string, TypeRef>([
	['any', ANY_TYPE],
	['bool', BOOL_TYPE],
	['error', ERROR_TYPE],
	['float64', FLOAT_TYPE],
	['int', INT_TYPE],
	['string', STRING_TYPE],
])

export function universeType(name: string): TypeRef | undefined {
	return UNIVERSE_TYPES.get(name)
}

export const Builtin = {
	Len: 'len',
	Panic: 'panic',
} as const

export type Builtin = (typeof Builtin)[keyof typeof Builtin]

export function isBuiltin(name: string): name is Builtin {
	return name === Builtin.Len || name === Builtin.Panic
}

/** Static type of a literal of the given kind. */
export function literalType(kind: 'string' | 'int' | 'float' | 'bool'): TypeRef {
	switch (kind) {
		case 'string':
			return STRING_TYPE
		case 'int':
			return INT_TYPE
		case 'float':
			return FLOAT_TYPE
		case 'bool':
			return BOOL_TYPE
	}
}
