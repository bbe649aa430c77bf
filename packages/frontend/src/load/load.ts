/**
 * Workspace loading from disk.
 *
 * Every directory under the root that holds `.seal` files is one module;
 * its path is the directory relative to the root, `/`-separated. Sources
 * directly in the root form the module `.`.
 */

import type { Dirent, Stats } from 'node:fs'
import { readdir, readFile, stat } from 'node:fs/promises'
import { dirname, join, relative, sep } from 'node:path'
import { LoadError } from '../core/errors.ts'
import { type SealHost, Workspace, type WorkspaceOptions } from '../workspace/workspace.ts'

export const SOURCE_EXTENSION = '.seal'

export interface LoadedWorkspace {
	readonly workspace: Workspace
	readonly host: SealHost
	/** Source files found, in load order */
	readonly files: readonly string[]
}

function errorCode(error: unknown): string | undefined {
	if (!(error instanceof Error) || !('code' in error)) return undefined
	return typeof error.code === 'string' ? error.code : undefined
}

function toLoadError(path: string, error: unknown): LoadError {
	const reason = error instanceof Error ? error.message : String(error)
	return new LoadError(path, reason, errorCode(error))
}

async function listDirectory(dir: string): Promise<Dirent[]> {
	try {
		return await readdir(dir, { withFileTypes: true })
	} catch (error: unknown) {
		throw toLoadError(dir, error)
	}
}

/**
 * All `.seal` files under `dir`, sorted. Hidden directories and
 * node_modules are skipped.
 */
export async function findSourceFiles(dir: string): Promise<string[]> {
	const found: string[] = []
	for (const entry of await listDirectory(dir)) {
		const path = join(dir, entry.name)
		if (entry.isDirectory()) {
			if (entry.name.startsWith('.') || entry.name === 'node_modules') continue
			found.push(...(await findSourceFiles(path)))
		} else if (entry.isFile() && entry.name.endsWith(SOURCE_EXTENSION)) {
			found.push(path)
		}
	}
	return found.sort()
}

export function modulePathOf(root: string, file: string): string {
	const dir = relative(root, dirname(file))
	return dir === '' ? '.' : dir.split(sep).join('/')
}

async function readSource(path: string): Promise<string> {
	try {
		return await readFile(path, 'utf-8')
	} catch (error: unknown) {
		throw toLoadError(path, error)
	}
}

/**
 * Load and build the workspace at `root`, a directory or a single `.seal`
 * file. Syntax and binding problems are reported into the workspace's
 * context.
 *
 * @throws {LoadError} If `root` or one of its files cannot be read
 */
export async function loadWorkspace(
	root: string,
	options: WorkspaceOptions = {}
): Promise<LoadedWorkspace> {
	let info: Stats
	try {
		info = await stat(root)
	} catch (error: unknown) {
		throw toLoadError(root, error)
	}

	const base = info.isDirectory() ? root : dirname(root)
	const files = info.isDirectory() ? await findSourceFiles(root) : [root]
	const sources = await Promise.all(files.map(readSource))

	const workspace = new Workspace(options)
	files.forEach((file, i) => {
		workspace.addFile(modulePathOf(base, file), file, sources[i] ?? '')
	})

	return { files, host: workspace.build(), workspace }
}
