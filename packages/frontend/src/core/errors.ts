/**
 * Raised when a workspace cannot be read from disk.
 */
export class LoadError extends Error {
	readonly path: string
	/** errno code of the underlying failure, when there is one */
	readonly code: string | undefined

	constructor(path: string, message: string, code?: string) {
		super(message)
		this.name = 'LoadError'
		this.path = path
		this.code = code
	}
}
