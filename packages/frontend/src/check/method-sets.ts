/**
 * Method sets.
 *
 * A concrete type `T` has its value-receiver methods; `*T` has those plus
 * its pointer-receiver methods. An interface has the methods it declares.
 * Pointers to interfaces have none.
 */

import {
	type Arity,
	type Capability,
	type CapabilityMethod,
	type NamedType,
	sameType,
	type TypeRef,
	UNIVERSE_MODULE,
} from '@sealcheck/analyzer'
import { STRING_TYPE } from '../core/universe.ts'
import type { MethodSymbol, ModuleScope } from './state.ts'
import { resolveTypeNode } from './type-resolution.ts'

export interface ResolvedMethod {
	readonly params: number
	/** Result types; `undefined` where a result type does not resolve */
	readonly results: readonly (TypeRef | undefined)[]
}

const ERROR_METHOD: ResolvedMethod = { params: 0, results: [STRING_TYPE] }

function declaredMethod(
	type: NamedType,
	name: string,
	modules: ReadonlyMap<string, ModuleScope>
): MethodSymbol | undefined {
	return modules.get(type.module)?.methods.get(type.name)?.get(name)
}

function resolveMethod(symbol: MethodSymbol): ResolvedMethod {
	return {
		params: symbol.params,
		results: symbol.results.map((result) => resolveTypeNode(result, symbol.scope)),
	}
}

/**
 * The method `name` in the method set of `type`.
 */
export function findMethod(
	type: TypeRef,
	name: string,
	modules: ReadonlyMap<string, ModuleScope>
): ResolvedMethod | undefined {
	switch (type.kind) {
		case 'basic':
			return undefined
		case 'named': {
			if (type.module === UNIVERSE_MODULE) {
				return type.name === 'error' && name === 'Error' ? ERROR_METHOD : undefined
			}
			const symbol = declaredMethod(type, name, modules)
			return symbol !== undefined && !symbol.pointerReceiver ? resolveMethod(symbol) : undefined
		}
		case 'pointer': {
			const { elem } = type
			if (elem.kind !== 'named' || elem.abstract || elem.module === UNIVERSE_MODULE) return undefined
			const symbol = declaredMethod(elem, name, modules)
			return symbol === undefined ? undefined : resolveMethod(symbol)
		}
	}
}

export function hasMethod(
	type: TypeRef,
	name: string,
	arity: Arity,
	modules: ReadonlyMap<string, ModuleScope>
): boolean {
	const method = findMethod(type, name, modules)
	return (
		method !== undefined &&
		method.params === arity.params &&
		method.results.length === arity.results
	)
}

export function satisfiesCapability(
	type: TypeRef,
	capability: Capability,
	modules: ReadonlyMap<string, ModuleScope>
): boolean {
	return capability.methods.every((method) => providesMethod(type, method, modules))
}

function providesMethod(
	type: TypeRef,
	required: CapabilityMethod,
	modules: ReadonlyMap<string, ModuleScope>
): boolean {
	if (!hasMethod(type, required.name, required, modules)) return false
	const { resultTypes } = required
	if (resultTypes === undefined) return true

	const results = findMethod(type, required.name, modules)?.results ?? []
	return resultTypes.every((expected, i) => {
		const actual = results[i]
		return actual !== undefined && sameType(actual, expected)
	})
}
