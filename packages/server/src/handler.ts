/**
 * Routing for the draw API, independent of the HTTP transport
 */

import { checkSampleLimit, draw, isRasterkitError, parseDrawRequest } from 'rasterkit'
import { DEFAULT_CONFIG } from './config'
import type { HttpReply, Logger, ServerConfig } from './types'

export const DRAW_PATH = '/api/draw'

export function json(status: number, payload: unknown): HttpReply {
	return {
		status,
		headers: { 'Content-Type': 'application/json' },
		body: JSON.stringify(payload),
	}
}

export function text(status: number, message: string, headers: Record<string, string> = {}): HttpReply {
	return {
		status,
		headers: { 'Content-Type': 'text/plain; charset=utf-8', ...headers },
		body: `${message}\n`,
	}
}

/**
 * Handle one request. Client mistakes map to 4xx; anything else is logged and reported as 500.
 * Requests whose output would exceed maxSamples are rejected before rasterizing.
 */
export function handleRequest(
	method: string,
	path: string,
	body: string,
	logger: Logger = console,
	limits: Pick<ServerConfig, 'maxSamples'> = DEFAULT_CONFIG
): HttpReply {
	if (path !== DRAW_PATH) {
		return text(404, 'Not found')
	}
	if (method !== 'POST') {
		return text(405, 'Only POST allowed', { Allow: 'POST' })
	}

	let payload: unknown
	try {
		payload = JSON.parse(body)
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err)
		return json(400, { error: 'INVALID_JSON', message })
	}

	try {
		const request = parseDrawRequest(payload)
		checkSampleLimit(request, limits.maxSamples)
		return json(200, draw(request))
	} catch (err) {
		if (isRasterkitError(err)) {
			return json(400, { error: err.code, message: err.message })
		}
		logger.error('Draw failed:', err)
		return json(500, { error: 'INTERNAL', message: 'Internal server error' })
	}
}
