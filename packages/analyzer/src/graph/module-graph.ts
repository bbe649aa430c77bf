/**
 * The module dependency graph.
 *
 * Edges run from a module to the workspace modules it imports. Imports of
 * modules the host did not provide (libraries) carry no facts and are not
 * part of the graph.
 */

import { InvariantError, ModuleGraphError } from '../core/errors.ts'
import type { ModuleUnit } from '../core/host.ts'

export class ModuleGraph {
	private readonly modules = new Map<string, ModuleUnit>()

	constructor(modules: Iterable<ModuleUnit>) {
		for (const module of modules) {
			if (this.modules.has(module.path)) {
				throw new InvariantError(`module ${module.path} listed twice`)
			}
			this.modules.set(module.path, module)
		}
	}

	/**
	 * Workspace modules imported by `module`, deduplicated, sorted by path.
	 */
	dependencies(module: ModuleUnit): ModuleUnit[] {
		const paths = [...new Set(module.imports)].sort()
		const deps: ModuleUnit[] = []
		for (const path of paths) {
			const dep = this.modules.get(path)
			if (dep !== undefined) deps.push(dep)
		}
		return deps
	}

	/**
	 * Dependencies first; ties broken by module path so the order is stable.
	 * Throws ModuleGraphError when the imports form a cycle.
	 */
	topologicalOrder(): ModuleUnit[] {
		const cycle = this.findCycle()
		if (cycle !== null) throw new ModuleGraphError(cycle)

		const order: ModuleUnit[] = []
		const visited = new Set<string>()
		const visit = (module: ModuleUnit): void => {
			if (visited.has(module.path)) return
			visited.add(module.path)
			for (const dep of this.dependencies(module)) visit(dep)
			order.push(module)
		}
		for (const path of [...this.modules.keys()].sort()) {
			const module = this.modules.get(path)
			if (module !== undefined) visit(module)
		}
		return order
	}

	/**
	 * First import cycle found, as a path list closed on its first element.
	 */
	findCycle(): string[] | null {
		const state = new Map<string, 'active' | 'done'>()
		const stack: string[] = []

		const visit = (module: ModuleUnit): string[] | null => {
			state.set(module.path, 'active')
			stack.push(module.path)
			for (const dep of this.dependencies(module)) {
				const depState = state.get(dep.path)
				if (depState === 'active') {
					return [...stack.slice(stack.indexOf(dep.path)), dep.path]
				}
				if (depState === undefined) {
					const found = visit(dep)
					if (found !== null) return found
				}
			}
			stack.pop()
			state.set(module.path, 'done')
			return null
		}

		for (const path of [...this.modules.keys()].sort()) {
			const module = this.modules.get(path)
			if (module === undefined || state.has(path)) continue
			const found = visit(module)
			if (found !== null) return found
		}
		return null
	}
}
