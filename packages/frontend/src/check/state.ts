/**
 * Binder state: what each module declares and what each file can see.
 *
 * Symbols remember the file scope they were declared in, since a type name
 * in a declaration is resolved against that file's imports.
 */

import type {
	CallExpression,
	Expression,
	FunctionDeclaration,
	ModuleUnit,
	NamedType,
	TypeNode,
	TypeRef,
	VariableDeclaration,
} from '@sealcheck/analyzer'
import type { SealDeclaration, SealTypeDeclaration, SourceFile } from '../core/source.ts'
import type { StdlibModule } from '../core/stdlib.ts'

/**
 * What an import name refers to.
 */
export type ImportTarget =
	| { readonly kind: 'module'; readonly module: ModuleScope }
	| { readonly kind: 'stdlib'; readonly module: StdlibModule }

export interface FileScope {
	readonly file: SourceFile
	readonly module: ModuleScope
	/** Import names (alias or last path segment) of this file */
	readonly imports: ReadonlyMap<string, ImportTarget>
}

export interface TypeSymbol {
	readonly type: NamedType
	readonly declaration: SealTypeDeclaration
	readonly scope: FileScope
}

export interface FunctionSymbol {
	readonly declaration: FunctionDeclaration
	readonly scope: FileScope
}

export interface VariableSymbol {
	readonly declaration: VariableDeclaration
	readonly scope: FileScope
}

/**
 * A method of a named type, declared either by a function with a receiver or
 * in an interface body.
 */
export interface MethodSymbol {
	readonly name: string
	readonly params: number
	readonly results: readonly TypeNode[]
	/** Declared on `*T`; only pointer method sets include it */
	readonly pointerReceiver: boolean
	readonly scope: FileScope
}

/**
 * Declarations of one module, in file order then source order.
 */
export class ModuleScope {
	readonly path: string
	readonly name: string
	readonly files: FileScope[] = []
	readonly declarations: SealDeclaration[] = []
	readonly types = new Map<string, TypeSymbol>()
	readonly functions = new Map<string, FunctionSymbol>()
	readonly variables = new Map<string, VariableSymbol>()
	/** Methods keyed by receiver type name, then method name */
	readonly methods = new Map<string, Map<string, MethodSymbol>>()
	/** Workspace modules this module imports */
	readonly imports = new Set<string>()

	constructor(path: string, name: string) {
		this.path = path
		this.name = name
	}

	/** Whether `name` is already taken by a type, function or variable. */
	declares(name: string): boolean {
		return this.types.has(name) || this.functions.has(name) || this.variables.has(name)
	}

	methodsOf(typeName: string): Map<string, MethodSymbol> {
		let methods = this.methods.get(typeName)
		if (methods === undefined) {
			methods = new Map()
			this.methods.set(typeName, methods)
		}
		return methods
	}

	toUnit(): ModuleUnit {
		return { imports: [...this.imports].sort(), name: this.name, path: this.path }
	}
}

/**
 * Static types recorded while checking function bodies, keyed by node
 * identity.
 */
export interface TypeTable {
	record(node: Expression | TypeNode, type: TypeRef | undefined): TypeRef | undefined
	/** Marks a call as a call to the built-in `panic` */
	markAbort(call: CallExpression): void
}
