/**
 * Check phase: match type switches to facts and report missing variants.
 */

export {
	classifyDefaultArm,
	DEFAULT_ARM_RULES,
	type DefaultArmRule,
	type DefaultArmVerdict,
	isDefaultArmRule,
	isSafetyGuard,
} from './default-arm.ts'
export {
	collectHandled,
	type DispatchSite,
	findDefaultArm,
	matchDispatchSite,
} from './dispatch.ts'
export {
	type CheckOptions,
	checkDispatchSite,
	checkModule,
	findMissingVariants,
	formatMissing,
} from './exhaustive.ts'
