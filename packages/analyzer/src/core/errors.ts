/**
 * Engine-level failures. User-facing problems are diagnostics, not errors;
 * these abort the run.
 */

/**
 * A broken engine invariant, such as a contract's fact being exported twice.
 * Indicates a defect in the analyzer, never bad input.
 */
export class InvariantError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'InvariantError'
	}
}

/**
 * The module graph has no topological order.
 */
export class ModuleGraphError extends Error {
	/** Module paths along the cycle, first path repeated at the end */
	readonly cycle: readonly string[]

	constructor(cycle: readonly string[]) {
		super(`import cycle: ${cycle.join(' -> ')}`)
		this.name = 'ModuleGraphError'
		this.cycle = cycle
	}
}
