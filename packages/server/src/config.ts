import type { Logger, ServerConfig } from './types'

export const DEFAULT_CONFIG: ServerConfig = {
	port: 8083,
	host: '0.0.0.0',
	maxBodyBytes: 1024 * 1024,
	maxSamples: 100_000,
	verbose: false,
}

function readNumber(
	env: NodeJS.ProcessEnv,
	key: string,
	fallback: number,
	logger: Logger,
	valid: (n: number) => boolean
): number {
	const raw = env[key]
	if (raw === undefined || raw === '') return fallback

	const value = Number(raw)
	if (!Number.isInteger(value) || !valid(value)) {
		logger.warn(`Ignoring invalid ${key}=${raw}, using ${fallback}`)
		return fallback
	}
	return value
}

/**
 * Read server settings from environment variables
 * (PORT, HOST, MAX_BODY_BYTES, MAX_SAMPLES, VERBOSE)
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env, logger: Logger = console): ServerConfig {
	const verbose = env.VERBOSE?.toLowerCase()

	return {
		port: readNumber(env, 'PORT', DEFAULT_CONFIG.port, logger, (n) => n >= 0 && n <= 65535),
		host: env.HOST || DEFAULT_CONFIG.host,
		maxBodyBytes: readNumber(env, 'MAX_BODY_BYTES', DEFAULT_CONFIG.maxBodyBytes, logger, (n) => n > 0),
		maxSamples: readNumber(env, 'MAX_SAMPLES', DEFAULT_CONFIG.maxSamples, logger, (n) => n > 0),
		verbose: verbose === '1' || verbose === 'true',
	}
}
