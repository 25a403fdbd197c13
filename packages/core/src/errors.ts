/**
 * Error types surfaced to callers
 */

export type ErrorCode = 'UNSUPPORTED_ALGORITHM' | 'INVALID_REQUEST'

/**
 * Base class for client-side errors (bad algorithm name, malformed request)
 */
export class RasterkitError extends Error {
	readonly code: ErrorCode

	constructor(code: ErrorCode, message: string) {
		super(message)
		this.name = new.target.name
		this.code = code
	}
}

/**
 * Algorithm name not recognized by the dispatcher
 */
export class UnsupportedAlgorithmError extends RasterkitError {
	readonly algorithm: string

	constructor(algorithm: string) {
		super('UNSUPPORTED_ALGORITHM', `Unknown algorithm: ${algorithm}`)
		this.algorithm = algorithm
	}
}

/**
 * Request payload failed validation
 */
export class InvalidRequestError extends RasterkitError {
	readonly field: string | undefined

	constructor(message: string, field?: string) {
		super('INVALID_REQUEST', message)
		this.field = field
	}
}

export function isRasterkitError(err: unknown): err is RasterkitError {
	return err instanceof RasterkitError
}
