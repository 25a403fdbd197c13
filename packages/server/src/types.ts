/**
 * Server types
 */

/** Console-compatible sink for server messages */
export type Logger = Pick<Console, 'log' | 'warn' | 'error'>

export interface ServerConfig {
	/** Listen port (default 8083) */
	port: number
	/** Listen host (default 0.0.0.0) */
	host: string
	/** Largest accepted request body in bytes */
	maxBodyBytes: number
	/** Largest number of samples a single draw may produce */
	maxSamples: number
	/** Log one line per request */
	verbose: boolean
}

/** Response produced by the router */
export interface HttpReply {
	status: number
	headers: Record<string, string>
	body: string
}
