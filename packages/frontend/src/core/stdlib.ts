/**
 * Stub standard library: importable modules whose functions are known only
 * by their result types. The table lives in stdlib.json.
 */

import { readFileSync } from 'node:fs'
import type { TypeRef } from '@sealcheck/analyzer'
import { universeType } from './universe.ts'

export interface StdlibModule {
	readonly path: string
	/** Result types of each function */
	readonly functions: ReadonlyMap<string, readonly TypeRef[]>
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

function resolveResults(owner: string, names: readonly string[]): TypeRef[] {
	return names.map((name) => {
		const type = universeType(name)
		if (type === undefined) {
			throw new Error(`stdlib: ${owner} returns unknown type "${name}"`)
		}
		return type
	})
}

/**
 * Validate the stdlib table: `{ module: { function: [resultType, ...] } }`.
 */
export function parseStdlib(table: unknown): Map<string, StdlibModule> {
	if (!isRecord(table)) throw new Error('stdlib: expected an object of modules')

	const modules = new Map<string, StdlibModule>()
	for (const [path, entries] of Object.entries(table)) {
		if (!isRecord(entries)) throw new Error(`stdlib: module "${path}" must be an object`)
		const functions = new Map<string, readonly TypeRef[]>()
		for (const [name, results] of Object.entries(entries)) {
			if (!isStringArray(results)) {
				throw new Error(`stdlib: ${path}.${name} must list result type names`)
			}
			functions.set(name, resolveResults(`${path}.${name}`, results))
		}
		modules.set(path, { functions, path })
	}
	return modules
}

let stdlib: Map<string, StdlibModule> | null = null

export function loadStdlib(): ReadonlyMap<string, StdlibModule> {
	stdlib ??= parseStdlib(JSON.parse(readFileSync(new URL('./stdlib.json', import.meta.url), 'utf-8')))
	return stdlib
}
