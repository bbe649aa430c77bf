/**
 * @sealcheck/frontend
 *
 * Reference host for the analyzer: parses `.seal` sources, binds modules and
 * types function bodies.
 */

export { LoadError } from './core/errors.ts'
export {
	type FieldSpec,
	type ImportSpec,
	type InterfaceMethod,
	isExportedName,
	type SealDeclaration,
	type SealTypeDeclaration,
	type SourceFile,
	type TypeBody,
} from './core/source.ts'
export { loadStdlib, parseStdlib, type StdlibModule } from './core/stdlib.ts'
export { ANY_TYPE, ERROR_CAPABILITY, ERROR_TYPE, universeType } from './core/universe.ts'
export { createSemantics, SealGrammar } from './grammar/index.ts'
export {
	findSourceFiles,
	type LoadedWorkspace,
	loadWorkspace,
	modulePathOf,
	SOURCE_EXTENSION,
} from './load/load.ts'
export { type ParseResult, parseSource } from './parse/parser.ts'
export { SealHost, Workspace, type WorkspaceOptions } from './workspace/workspace.ts'
