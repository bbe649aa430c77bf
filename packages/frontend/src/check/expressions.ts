/**
 * Body checker: walks function bodies and records the static type of every
 * expression and type node it meets.
 *
 * Typing is best-effort. Anything the dialect cannot type (function values,
 * multi-value calls, unknown names) is recorded as unresolved and the engine
 * skips it.
 */

import {
	type CallExpression,
	type Expression,
	type FunctionDeclaration,
	pointerElemNamed,
	pointerTo,
	type SelectorExpression,
	type Statement,
	type TypeNode,
	type TypeRef,
	type TypeSwitchStatement,
	type UnaryExpression,
} from '@sealcheck/analyzer'
import type { SealDeclaration, TypeBody } from '../core/source.ts'
import {
	BOOL_TYPE,
	Builtin,
	INT_TYPE,
	isBuiltin,
	literalType,
	UNTYPED_NIL,
	universeType,
} from '../core/universe.ts'
import { findMethod } from './method-sets.ts'
import type {
	FileScope,
	ImportTarget,
	ModuleScope,
	TypeTable,
	VariableSymbol,
} from './state.ts'
import { resolveTypeNode } from './type-resolution.ts'

const BOOLEAN_OPERATORS = new Set(['==', '!=', '<', '<=', '>', '>=', '&&', '||'])

/**
 * Block-scoped local variables. A local with an unresolved type still
 * shadows outer names.
 */
class Locals {
	private readonly names = new Map<string, TypeRef | undefined>()
	private readonly parent: Locals | null

	constructor(parent: Locals | null = null) {
		this.parent = parent
	}

	define(name: string, type: TypeRef | undefined): void {
		if (name !== '_') this.names.set(name, type)
	}

	lookup(name: string): { type: TypeRef | undefined } | undefined {
		if (this.names.has(name)) return { type: this.names.get(name) }
		return this.parent?.lookup(name)
	}
}

export class Checker {
	private readonly modules: ReadonlyMap<string, ModuleScope>
	private readonly table: TypeTable
	private readonly variableTypes = new Map<VariableSymbol, TypeRef | undefined>()
	private readonly pending = new Set<VariableSymbol>()

	constructor(modules: ReadonlyMap<string, ModuleScope>, table: TypeTable) {
		this.modules = modules
		this.table = table
	}

	checkModule(module: ModuleScope): void {
		for (const scope of module.files) {
			for (const declaration of scope.file.declarations) {
				this.checkDeclaration(declaration, scope)
			}
		}
	}

	// ===========================================================================
	// Declarations
	// ===========================================================================

	private checkDeclaration(declaration: SealDeclaration, scope: FileScope): void {
		switch (declaration.kind) {
			case 'type':
				this.checkTypeDeclaration(declaration.body, scope)
				return
			case 'function':
				this.checkFunction(declaration, scope)
				return
			case 'variable': {
				const symbol = scope.module.variables.get(declaration.name)
				if (symbol?.declaration === declaration) {
					this.variableType(symbol)
					return
				}
				if (declaration.type !== null) this.resolve(declaration.type, scope)
				if (declaration.value !== null) this.typeOf(declaration.value, new Locals(), scope)
				return
			}
		}
	}

	private checkTypeDeclaration(body: TypeBody, scope: FileScope): void {
		switch (body.kind) {
			case 'interface':
				for (const method of body.methods) {
					for (const param of method.params) this.resolve(param.type, scope)
					for (const result of method.results) this.resolve(result, scope)
				}
				return
			case 'struct':
				for (const field of body.fields) this.resolve(field.type, scope)
				return
			case 'defined':
				this.resolve(body.underlying, scope)
				return
		}
	}

	private checkFunction(declaration: FunctionDeclaration, scope: FileScope): void {
		const locals = new Locals()
		const parameters = declaration.receiver
			? [declaration.receiver, ...declaration.params]
			: declaration.params
		for (const param of parameters) {
			const type = this.resolve(param.type, scope)
			if (param.name !== null) locals.define(param.name, type)
		}
		for (const result of declaration.results) this.resolve(result, scope)
		this.checkStatements(declaration.body, locals, scope)
	}

	// ===========================================================================
	// Statements
	// ===========================================================================

	private checkStatements(statements: readonly Statement[], locals: Locals, scope: FileScope): void {
		for (const statement of statements) {
			this.checkStatement(statement, locals, scope)
		}
	}

	private checkStatement(statement: Statement, locals: Locals, scope: FileScope): void {
		switch (statement.kind) {
			case 'expression':
				this.typeOf(statement.expression, locals, scope)
				return
			case 'return':
				for (const result of statement.results) this.typeOf(result, locals, scope)
				return
			case 'define':
				locals.define(statement.name, this.typeOf(statement.value, locals, scope))
				return
			case 'block':
				this.checkStatements(statement.body, new Locals(locals), scope)
				return
			case 'typeSwitch':
				this.checkTypeSwitch(statement, locals, scope)
				return
		}
	}

	/**
	 * In a clause naming exactly one type the binding has that type;
	 * elsewhere it has the subject's type.
	 */
	private checkTypeSwitch(statement: TypeSwitchStatement, locals: Locals, scope: FileScope): void {
		const subject = this.typeOf(statement.subject, locals, scope)

		for (const clause of statement.clauses) {
			const caseTypes = (clause.types ?? []).map((caseType) =>
				caseType.kind === 'nil'
					? this.table.record(caseType, UNTYPED_NIL)
					: this.resolve(caseType, scope)
			)

			const clauseLocals = new Locals(locals)
			if (statement.binding !== null) {
				const only = clause.types?.length === 1 ? clause.types[0] : undefined
				const bound = only !== undefined && only.kind !== 'nil' ? caseTypes[0] : subject
				clauseLocals.define(statement.binding, bound)
			}
			this.checkStatements(clause.body, clauseLocals, scope)
		}
	}

	// ===========================================================================
	// Expressions
	// ===========================================================================

	private resolve(node: TypeNode, scope: FileScope): TypeRef | undefined {
		return resolveTypeNode(node, scope, this.table)
	}

	private typeOf(expression: Expression, locals: Locals, scope: FileScope): TypeRef | undefined {
		return this.table.record(expression, this.infer(expression, locals, scope))
	}

	private infer(expression: Expression, locals: Locals, scope: FileScope): TypeRef | undefined {
		switch (expression.kind) {
			case 'identifier':
				return this.identifierType(expression.name, locals, scope)
			case 'nil':
				return UNTYPED_NIL
			case 'literal':
				return literalType(expression.type)
			case 'paren':
				return this.typeOf(expression.inner, locals, scope)
			case 'unary':
				return this.unaryType(expression, locals, scope)
			case 'binary': {
				const left = this.typeOf(expression.left, locals, scope)
				const right = this.typeOf(expression.right, locals, scope)
				if (BOOLEAN_OPERATORS.has(expression.operator)) return BOOL_TYPE
				return left ?? right
			}
			case 'composite': {
				for (const field of expression.fields) this.typeOf(field.value, locals, scope)
				return this.resolve(expression.type, scope)
			}
			case 'selector':
				return this.selectorType(expression, locals, scope)
			case 'call':
				return this.callType(expression, locals, scope)
		}
	}

	private unaryType(expression: UnaryExpression, locals: Locals, scope: FileScope): TypeRef | undefined {
		const operand = this.typeOf(expression.operand, locals, scope)
		switch (expression.operator) {
			case '&':
				return operand === undefined ? undefined : pointerTo(operand)
			case '*':
				return operand?.kind === 'pointer' ? operand.elem : undefined
			case '-':
				return operand
			case '!':
				return BOOL_TYPE
		}
	}

	private identifierType(name: string, locals: Locals, scope: FileScope): TypeRef | undefined {
		const local = locals.lookup(name)
		if (local !== undefined) return local.type
		const variable = scope.module.variables.get(name)
		return variable === undefined ? undefined : this.variableType(variable)
	}

	/**
	 * The import an identifier names, unless a local or module-level name
	 * shadows it.
	 */
	private importTarget(
		expression: Expression,
		locals: Locals,
		scope: FileScope
	): ImportTarget | undefined {
		if (expression.kind !== 'identifier') return undefined
		if (locals.lookup(expression.name) !== undefined) return undefined
		if (scope.module.declares(expression.name)) return undefined
		return scope.imports.get(expression.name)
	}

	private selectorType(
		expression: SelectorExpression,
		locals: Locals,
		scope: FileScope
	): TypeRef | undefined {
		const target = this.importTarget(expression.object, locals, scope)
		if (target !== undefined) {
			if (target.kind !== 'module') return undefined
			const variable = target.module.variables.get(expression.name)
			return variable === undefined ? undefined : this.variableType(variable)
		}

		const object = this.typeOf(expression.object, locals, scope)
		return object === undefined ? undefined : this.fieldType(object, expression.name)
	}

	/** Struct field of `T` or `*T`. */
	private fieldType(type: TypeRef, name: string): TypeRef | undefined {
		const named = type.kind === 'named' ? type : pointerElemNamed(type)
		if (named === null) return undefined
		const symbol = this.modules.get(named.module)?.types.get(named.name)
		if (symbol === undefined || symbol.declaration.body.kind !== 'struct') return undefined
		const field = symbol.declaration.body.fields.find((f) => f.name === name)
		return field === undefined ? undefined : resolveTypeNode(field.type, symbol.scope)
	}

	private callType(call: CallExpression, locals: Locals, scope: FileScope): TypeRef | undefined {
		for (const arg of call.args) this.typeOf(arg, locals, scope)

		const { callee } = call
		if (
			callee.kind === 'identifier' &&
			isBuiltin(callee.name) &&
			locals.lookup(callee.name) === undefined &&
			!scope.module.declares(callee.name)
		) {
			if (callee.name === Builtin.Panic) {
				this.table.markAbort(call)
				return undefined
			}
			return INT_TYPE
		}

		const results = this.calleeResults(callee, locals, scope)
		return results?.length === 1 ? results[0] : undefined
	}

	/**
	 * Result types of whatever `callee` names: a function, a method, or a type
	 * used as a conversion.
	 */
	private calleeResults(
		callee: Expression,
		locals: Locals,
		scope: FileScope
	): readonly (TypeRef | undefined)[] | undefined {
		switch (callee.kind) {
			case 'paren':
				return this.calleeResults(callee.inner, locals, scope)
			case 'identifier':
				return this.namedCalleeResults(callee.name, locals, scope)
			case 'selector':
				return this.selectorCalleeResults(callee, locals, scope)
			default:
				this.typeOf(callee, locals, scope)
				return undefined
		}
	}

	private namedCalleeResults(
		name: string,
		locals: Locals,
		scope: FileScope
	): readonly (TypeRef | undefined)[] | undefined {
		if (locals.lookup(name) !== undefined) return undefined
		return this.moduleMemberResults(scope.module, name) ?? this.conversion(universeType(name))
	}

	private selectorCalleeResults(
		callee: SelectorExpression,
		locals: Locals,
		scope: FileScope
	): readonly (TypeRef | undefined)[] | undefined {
		const target = this.importTarget(callee.object, locals, scope)
		if (target?.kind === 'stdlib') return target.module.functions.get(callee.name)
		if (target?.kind === 'module') return this.moduleMemberResults(target.module, callee.name)

		const receiver = this.typeOf(callee.object, locals, scope)
		if (receiver === undefined) return undefined
		const method =
			findMethod(receiver, callee.name, this.modules) ??
			(receiver.kind === 'named' && !receiver.abstract
				? findMethod(pointerTo(receiver), callee.name, this.modules)
				: undefined)
		return method?.results
	}

	/** A module-level function, or a declared type used as a conversion. */
	private moduleMemberResults(
		module: ModuleScope,
		name: string
	): readonly (TypeRef | undefined)[] | undefined {
		const fn = module.functions.get(name)
		if (fn !== undefined) {
			return fn.declaration.results.map((result) => resolveTypeNode(result, fn.scope))
		}
		return this.conversion(module.types.get(name)?.type)
	}

	private conversion(type: TypeRef | undefined): readonly TypeRef[] | undefined {
		return type === undefined ? undefined : [type]
	}

	/**
	 * Declared type of a module-level variable, or the type of its initializer.
	 * Variables initialized in a cycle stay unresolved.
	 */
	private variableType(symbol: VariableSymbol): TypeRef | undefined {
		if (this.variableTypes.has(symbol)) return this.variableTypes.get(symbol)
		if (this.pending.has(symbol)) return undefined
		this.pending.add(symbol)

		const { declaration, scope } = symbol
		const declared =
			declaration.type === null ? undefined : this.resolve(declaration.type, scope)
		const initialized =
			declaration.value === null ? undefined : this.typeOf(declaration.value, new Locals(), scope)
		const type = declaration.type === null ? initialized : declared

		this.pending.delete(symbol)
		this.variableTypes.set(symbol, type)
		return type
	}
}
