/**
 * Syntax model of a parsed `.seal` file.
 *
 * Statements, expressions and type nodes are the analyzer's own node shapes,
 * so the tree the engine walks is the tree the parser built. Declarations
 * carry extra detail (struct fields, interface method signatures) that type
 * resolution needs and the engine does not.
 */

import type {
	FunctionDeclaration,
	Parameter,
	SourcePosition,
	TypeDeclaration,
	TypeNode,
	VariableDeclaration,
} from '@sealcheck/analyzer'

export interface ImportSpec {
	readonly path: string
	/** Explicit local name, when given */
	readonly alias: string | null
	readonly position: SourcePosition
}

export interface FieldSpec {
	readonly name: string
	readonly type: TypeNode
}

export interface InterfaceMethod {
	readonly name: string
	readonly params: readonly Parameter[]
	readonly results: readonly TypeNode[]
	readonly position: SourcePosition
}

export type TypeBody =
	| { readonly kind: 'interface'; readonly methods: readonly InterfaceMethod[] }
	| { readonly kind: 'struct'; readonly fields: readonly FieldSpec[] }
	| { readonly kind: 'defined'; readonly underlying: TypeNode }

export interface SealTypeDeclaration extends TypeDeclaration {
	readonly body: TypeBody
}

export type SealDeclaration = SealTypeDeclaration | FunctionDeclaration | VariableDeclaration

export interface SourceFile {
	readonly filename: string
	readonly packageName: string
	readonly packagePosition: SourcePosition
	readonly imports: readonly ImportSpec[]
	readonly declarations: readonly SealDeclaration[]
}

/**
 * Exported names start with an upper-case letter.
 */
export function isExportedName(name: string): boolean {
	return /^\p{Lu}/u.test(name)
}
