/**
 * Core data structures shared by the scan and check phases.
 */

export { AnalysisContext, comparePositions, type Diagnostic, type SourceLookup } from './context.ts'
export {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
} from './diagnostics.ts'
export { InvariantError, ModuleGraphError } from './errors.ts'
export type * from './host.ts'
export {
	basicType,
	isAbstractNamed,
	namedType,
	pointerElemNamed,
	pointerTo,
	sameType,
	typeString,
	UNIVERSE_MODULE,
} from './types.ts'
export { compareVariants, sortVariants, VariantName } from './variant.ts'
export { collectTypeSwitches, walkStatements } from './walk.ts'
