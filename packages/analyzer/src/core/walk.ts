/**
 * Statement traversal.
 */

import type { Declaration, Statement, TypeSwitchStatement } from './host.ts'

/**
 * Yield every statement in `body`, preorder, descending into blocks and
 * type-switch clauses.
 */
export function* walkStatements(body: readonly Statement[]): Generator<Statement> {
	for (const statement of body) {
		yield statement
		switch (statement.kind) {
			case 'block':
				yield* walkStatements(statement.body)
				break
			case 'typeSwitch':
				for (const clause of statement.clauses) {
					yield* walkStatements(clause.body)
				}
				break
		}
	}
}

/**
 * Every type switch in the function bodies of `declarations`, in source order.
 */
export function* collectTypeSwitches(
	declarations: Iterable<Declaration>
): Generator<TypeSwitchStatement> {
	for (const declaration of declarations) {
		if (declaration.kind !== 'function') continue
		for (const statement of walkStatements(declaration.body)) {
			if (statement.kind === 'typeSwitch') yield statement
		}
	}
}
