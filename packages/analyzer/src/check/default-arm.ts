/**
 * Default-arm classifier.
 *
 * A catch-all arm either means "everything else is fine" (intentional) or
 * "this cannot happen" (safety guard). Only a safety guard keeps the
 * exhaustiveness check in force.
 */

import type { AnalysisHost, Expression, ReturnStatement, Statement, TypeCaseClause } from '../core/host.ts'
import { pointerTo } from '../core/types.ts'

export type DefaultArmVerdict = 'intentional' | 'safety-guard'

/**
 * Which statements of the arm are looked at.
 * - `last-statement`: only the final statement decides; earlier ones are ignored.
 * - `sole-statement`: the arm must be a single guarding statement.
 */
export type DefaultArmRule = 'last-statement' | 'sole-statement'

export const DEFAULT_ARM_RULES: readonly DefaultArmRule[] = ['last-statement', 'sole-statement']

export function isDefaultArmRule(value: string): value is DefaultArmRule {
	return value === 'last-statement' || value === 'sole-statement'
}

function isAbortStatement(statement: Statement, host: AnalysisHost): boolean {
	if (statement.kind !== 'expression') return false
	const { expression } = statement
	return expression.kind === 'call' && host.isAbortCall(expression)
}

function isErrorValue(result: Expression, host: AnalysisHost): boolean {
	if (result.kind === 'nil') return false
	const type = host.resolveType(result)
	if (type === undefined) return false
	const capability = host.errorCapability()
	return host.satisfies(type, capability) || host.satisfies(pointerTo(type), capability)
}

function returnsError(statement: ReturnStatement, host: AnalysisHost): boolean {
	return statement.results.some((result) => isErrorValue(result, host))
}

/**
 * Whether a single statement signals "this should never happen".
 */
export function isSafetyGuard(statement: Statement, host: AnalysisHost): boolean {
	if (statement.kind === 'return') return returnsError(statement, host)
	return isAbortStatement(statement, host)
}

export function classifyDefaultArm(
	arm: TypeCaseClause,
	host: AnalysisHost,
	rule: DefaultArmRule = 'last-statement'
): DefaultArmVerdict {
	const last = arm.body[arm.body.length - 1]
	if (last === undefined) return 'intentional'
	if (rule === 'sole-statement' && arm.body.length !== 1) return 'intentional'
	return isSafetyGuard(last, host) ? 'safety-guard' : 'intentional'
}
