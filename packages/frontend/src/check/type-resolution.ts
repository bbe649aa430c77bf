/**
 * Resolution of type syntax to TypeRef values.
 */

import { pointerTo, type TypeNameNode, type TypeNode, type TypeRef } from '@sealcheck/analyzer'
import { universeType } from '../core/universe.ts'
import type { FileScope, TypeSymbol, TypeTable } from './state.ts'

/**
 * The declared type a name refers to: `Name` in the file's own module, or
 * `pkg.Name` in an imported workspace module.
 */
export function lookupTypeSymbol(node: TypeNameNode, scope: FileScope): TypeSymbol | undefined {
	if (node.qualifier === null) return scope.module.types.get(node.name)
	const target = scope.imports.get(node.qualifier)
	return target?.kind === 'module' ? target.module.types.get(node.name) : undefined
}

function resolveTypeName(node: TypeNameNode, scope: FileScope): TypeRef | undefined {
	const symbol = lookupTypeSymbol(node, scope)
	if (symbol !== undefined) return symbol.type
	return node.qualifier === null ? universeType(node.name) : undefined
}

/**
 * Resolve `node` in `scope`, recording the type of every nested node in
 * `table` when one is given.
 */
export function resolveTypeNode(
	node: TypeNode,
	scope: FileScope,
	table?: TypeTable
): TypeRef | undefined {
	let type: TypeRef | undefined
	if (node.kind === 'pointerType') {
		const elem = resolveTypeNode(node.elem, scope, table)
		type = elem === undefined ? undefined : pointerTo(elem)
	} else {
		type = resolveTypeName(node, scope)
	}
	return table === undefined ? type : table.record(node, type)
}
