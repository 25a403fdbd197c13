import { type DrawRequest, InvalidRequestError } from '@rasterkit/core'
import { estimateSamples } from './algorithms'

const COORDINATE_FIELDS = ['x1', 'y1', 'x2', 'y2', 'x3', 'y3', 'x4', 'y4', 'r'] as const

type CoordinateField = (typeof COORDINATE_FIELDS)[number]

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readInteger(payload: Record<string, unknown>, field: CoordinateField): number {
	const value = payload[field]
	if (value === undefined || value === null) return 0
	if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
		throw new InvalidRequestError(`${field} must be an integer`, field)
	}
	return value
}

/**
 * Validate a decoded JSON payload into a DrawRequest.
 * Missing coordinates default to 0. The algorithm name is checked later by the dispatcher.
 */
export function parseDrawRequest(input: unknown): DrawRequest {
	if (!isRecord(input)) {
		throw new InvalidRequestError('request must be a JSON object')
	}

	const algorithm = input.algorithm
	if (typeof algorithm !== 'string') {
		throw new InvalidRequestError('algorithm must be a string', 'algorithm')
	}

	const request: DrawRequest = {
		algorithm,
		x1: readInteger(input, 'x1'),
		y1: readInteger(input, 'y1'),
		x2: readInteger(input, 'x2'),
		y2: readInteger(input, 'y2'),
		x3: readInteger(input, 'x3'),
		y3: readInteger(input, 'y3'),
		x4: readInteger(input, 'x4'),
		y4: readInteger(input, 'y4'),
		r: readInteger(input, 'r'),
	}

	if (request.r < 0) {
		throw new InvalidRequestError('r must be non-negative', 'r')
	}

	return request
}

/**
 * Build a request from partial fields (missing coordinates are 0)
 */
export function drawRequest(algorithm: string, fields: Partial<Omit<DrawRequest, 'algorithm'>> = {}): DrawRequest {
	return parseDrawRequest({ ...fields, algorithm })
}

/**
 * Reject a request whose output would exceed maxSamples.
 * @throws UnsupportedAlgorithmError for unknown names
 */
export function checkSampleLimit(request: DrawRequest, maxSamples: number): void {
	const samples = estimateSamples(request)
	if (samples > maxSamples) {
		throw new InvalidRequestError(`request would produce up to ${samples} samples (limit ${maxSamples})`)
	}
}
