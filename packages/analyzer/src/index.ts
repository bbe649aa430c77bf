/**
 * sealcheck analyzer public API
 *
 * Checks that type switches over sealed contracts handle every variant.
 * A contract is an abstract type with an unexported, zero-argument,
 * zero-result discriminator method; its variants are the concrete types of
 * the same module that implement that method.
 *
 * The engine is host-neutral: parsing and type resolution come from an
 * AnalysisHost.
 */

export {
	type AnalysisResult,
	type AnalyzerOptions,
	analyze,
	analyzeModule,
	type ModuleReport,
} from './analyze.ts'
export {
	type CheckOptions,
	checkDispatchSite,
	checkModule,
	classifyDefaultArm,
	collectHandled,
	DEFAULT_ARM_RULES,
	type DefaultArmRule,
	type DefaultArmVerdict,
	type DispatchSite,
	findDefaultArm,
	findMissingVariants,
	formatMissing,
	isDefaultArmRule,
	isSafetyGuard,
	matchDispatchSite,
} from './check/index.ts'
export * from './core/index.ts'
export {
	type ContractId,
	contractId,
	contractIdOf,
	createFact,
	describeFact,
	FactStore,
	type VariantSetFact,
	type VariantSetFactInit,
} from './facts/index.ts'
export { ModuleGraph } from './graph/index.ts'
export {
	buildVariantSet,
	type ContractCandidate,
	exportModuleFacts,
	findDiscriminator,
	isDiscriminator,
	scanContracts,
} from './scan/index.ts'
