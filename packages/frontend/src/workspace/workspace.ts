/**
 * Workspace: the set of modules one analysis run sees, and the AnalysisHost
 * built from them.
 *
 * Files are added per module and parsed immediately. `build()` then binds
 * declarations, resolves imports and types every function body. Problems
 * with the input are reported into the workspace's context; the host is
 * still built from whatever bound cleanly.
 */

import {
	AnalysisContext,
	type AnalysisHost,
	type Arity,
	type CallExpression,
	type Capability,
	type Declaration,
	type Expression,
	type FunctionDeclaration,
	ModuleGraph,
	type ModuleUnit,
	namedType,
	type SourcePosition,
	type TypeNode,
	type TypeRef,
} from '@sealcheck/analyzer'
import type { SealDeclaration, SourceFile } from '../core/source.ts'
import { loadStdlib } from '../core/stdlib.ts'
import { ERROR_CAPABILITY } from '../core/universe.ts'
import { Checker } from '../check/expressions.ts'
import { hasMethod, satisfiesCapability } from '../check/method-sets.ts'
import { type FileScope, type ImportTarget, ModuleScope, type TypeTable } from '../check/state.ts'
import { parseSource } from '../parse/parser.ts'

export interface WorkspaceOptions {
	/** Context to report into; a new one rendering this workspace's sources is created when omitted */
	context?: AnalysisContext
}

class NodeTypeTable implements TypeTable {
	readonly types = new Map<Expression | TypeNode, TypeRef>()
	readonly aborts = new Set<CallExpression>()

	record(node: Expression | TypeNode, type: TypeRef | undefined): TypeRef | undefined {
		if (type !== undefined) this.types.set(node, type)
		return type
	}

	markAbort(call: CallExpression): void {
		this.aborts.add(call)
	}
}

/**
 * AnalysisHost over a built workspace.
 */
export class SealHost implements AnalysisHost {
	readonly modules: readonly ModuleUnit[]
	private readonly scopes: ReadonlyMap<string, ModuleScope>
	private readonly table: NodeTypeTable
	private readonly sources: ReadonlyMap<string, string>

	constructor(
		scopes: ReadonlyMap<string, ModuleScope>,
		table: NodeTypeTable,
		sources: ReadonlyMap<string, string>
	) {
		this.scopes = scopes
		this.table = table
		this.sources = sources
		this.modules = [...scopes.values()].map((scope) => scope.toUnit())
	}

	declarations(module: ModuleUnit): Iterable<Declaration> {
		return this.scopes.get(module.path)?.declarations ?? []
	}

	resolveType(node: Expression | TypeNode): TypeRef | undefined {
		return this.table.types.get(node)
	}

	implementsMethod(type: TypeRef, name: string, arity: Arity = { params: 0, results: 0 }): boolean {
		return hasMethod(type, name, arity, this.scopes)
	}

	errorCapability(): Capability {
		return ERROR_CAPABILITY
	}

	satisfies(type: TypeRef, capability: Capability): boolean {
		return satisfiesCapability(type, capability, this.scopes)
	}

	isAbortCall(call: CallExpression): boolean {
		return this.table.aborts.has(call)
	}

	sourceText(filename: string): string | undefined {
		return this.sources.get(filename)
	}
}

function lastSegment(path: string): string {
	return path.slice(path.lastIndexOf('/') + 1)
}

export class Workspace {
	readonly context: AnalysisContext
	private readonly files = new Map<string, SourceFile[]>()
	private readonly sources = new Map<string, string>()
	/** Every module path given a file, parsed or not */
	private readonly modulePaths = new Set<string>()

	constructor(options: WorkspaceOptions = {}) {
		this.context =
			options.context ?? new AnalysisContext((filename) => this.sources.get(filename))
	}

	/**
	 * Parse `source` as a file of module `modulePath`. Returns false when the
	 * file has syntax errors; it is then left out of the build.
	 */
	addFile(modulePath: string, filename: string, source: string): boolean {
		this.sources.set(filename, source)
		this.modulePaths.add(modulePath)
		const { file } = parseSource(source, filename, this.context)
		if (file === undefined) return false

		const files = this.files.get(modulePath) ?? []
		files.push(file)
		this.files.set(modulePath, files)
		return true
	}

	fileCount(): number {
		let count = 0
		for (const files of this.files.values()) count += files.length
		return count
	}

	/**
	 * Bind and type-check every added file. Call once.
	 */
	build(): SealHost {
		const { members, scopes } = this.createModules()
		const importPositions = new Map<string, Map<string, SourcePosition>>()

		for (const [scope, file] of members) {
			const imports = this.bindImports(file, scope, scopes, importPositions)
			scope.files.push({ file, imports, module: scope })
		}
		for (const scope of scopes.values()) {
			for (const fileScope of scope.files) {
				for (const declaration of fileScope.file.declarations) {
					this.declare(declaration, fileScope)
				}
			}
		}

		this.reportCycle(scopes, importPositions)

		const table = new NodeTypeTable()
		const checker = new Checker(scopes, table)
		for (const scope of scopes.values()) checker.checkModule(scope)

		return new SealHost(scopes, table, this.sources)
	}

	/**
	 * One scope per module directory. The first file (by name) sets the
	 * package name; files disagreeing with it are reported and left out.
	 */
	private createModules(): {
		scopes: Map<string, ModuleScope>
		members: [ModuleScope, SourceFile][]
	} {
		const scopes = new Map<string, ModuleScope>()
		const members: [ModuleScope, SourceFile][] = []

		for (const path of [...this.files.keys()].sort()) {
			const files = [...(this.files.get(path) ?? [])].sort((a, b) =>
				a.filename < b.filename ? -1 : a.filename > b.filename ? 1 : 0
			)
			const [first] = files
			if (first === undefined) continue

			const scope = new ModuleScope(path, first.packageName)
			for (const file of files) {
				if (file.packageName !== scope.name) {
					this.context.emit('SCLOAD001', file.packagePosition, {
						expected: scope.name,
						found: file.packageName,
						module: path,
					})
					continue
				}
				members.push([scope, file])
			}
			scopes.set(path, scope)
		}

		return { members, scopes }
	}

	/**
	 * Import names visible in `file`: the alias, or else the imported
	 * module's package name (the last path segment for library modules).
	 */
	private bindImports(
		file: SourceFile,
		module: ModuleScope,
		scopes: ReadonlyMap<string, ModuleScope>,
		importPositions: Map<string, Map<string, SourcePosition>>
	): Map<string, ImportTarget> {
		const stdlib = loadStdlib()
		const imports = new Map<string, ImportTarget>()

		for (const spec of file.imports) {
			const workspaceModule = scopes.get(spec.path)
			const stdlibModule = stdlib.get(spec.path)
			let target: ImportTarget
			if (workspaceModule !== undefined) {
				target = { kind: 'module', module: workspaceModule }
				module.imports.add(spec.path)
				const positions = importPositions.get(module.path) ?? new Map<string, SourcePosition>()
				if (!positions.has(spec.path)) positions.set(spec.path, spec.position)
				importPositions.set(module.path, positions)
			} else if (stdlibModule !== undefined) {
				target = { kind: 'stdlib', module: stdlibModule }
			} else {
				// A module whose files all failed to parse was already reported
				if (!this.modulePaths.has(spec.path)) {
					this.context.emit('SCLOAD002', spec.position, { path: spec.path })
				}
				continue
			}

			const name =
				spec.alias ?? (target.kind === 'module' ? target.module.name : lastSegment(spec.path))
			imports.set(name, target)
		}

		return imports
	}

	private declare(declaration: SealDeclaration, fileScope: FileScope): void {
		const module = fileScope.module

		if (declaration.kind === 'function' && declaration.receiver !== null) {
			this.declareMethod(declaration, declaration.receiver.type, fileScope)
			return
		}

		if (module.declares(declaration.name)) {
			this.context.emit('SCLOAD003', declaration.position, {
				module: module.path,
				name: declaration.name,
			})
			return
		}

		switch (declaration.kind) {
			case 'type': {
				const type = namedType(module.path, declaration.name, declaration.abstract)
				module.types.set(declaration.name, { declaration, scope: fileScope, type })
				if (declaration.body.kind === 'interface') {
					const methods = module.methodsOf(declaration.name)
					for (const method of declaration.body.methods) {
						methods.set(method.name, {
							name: method.name,
							params: method.params.length,
							pointerReceiver: false,
							results: method.results,
							scope: fileScope,
						})
					}
				}
				break
			}
			case 'function':
				module.functions.set(declaration.name, { declaration, scope: fileScope })
				break
			case 'variable':
				module.variables.set(declaration.name, { declaration, scope: fileScope })
				break
		}
		module.declarations.push(declaration)
	}

	/**
	 * Methods attach to the receiver's base type name: `T` or `*T` of a type
	 * in the same module.
	 */
	private declareMethod(
		declaration: FunctionDeclaration,
		receiver: TypeNode,
		scope: FileScope
	): void {
		const module = scope.module
		const pointerReceiver = receiver.kind === 'pointerType'
		const base = receiver.kind === 'pointerType' ? receiver.elem : receiver
		module.declarations.push(declaration)
		if (base.kind !== 'typeName' || base.qualifier !== null) return

		const methods = module.methodsOf(base.name)
		if (methods.has(declaration.name)) {
			this.context.emit('SCLOAD003', declaration.position, {
				module: module.path,
				name: `${base.name}.${declaration.name}`,
			})
			return
		}
		methods.set(declaration.name, {
			name: declaration.name,
			params: declaration.params.length,
			pointerReceiver,
			results: declaration.results,
			scope,
		})
	}

	private reportCycle(
		scopes: ReadonlyMap<string, ModuleScope>,
		importPositions: ReadonlyMap<string, ReadonlyMap<string, SourcePosition>>
	): void {
		const cycle = new ModuleGraph([...scopes.values()].map((s) => s.toUnit())).findCycle()
		if (cycle === null) return

		const [from, to] = cycle
		if (from === undefined || to === undefined) return
		const position = importPositions.get(from)?.get(to)
		if (position === undefined) return
		this.context.emit('SCLOAD004', position, { cycle: cycle.join(' -> ') })
	}
}
