import type { DrawRequest, DrawResponse } from '@rasterkit/core'
import { rasterize } from './algorithms'

/**
 * Monotonic clock in nanoseconds
 */
export type Clock = () => bigint

/**
 * Rasterize a request and report how long the rasterizer took
 */
export function draw(request: DrawRequest, clock: Clock = process.hrtime.bigint): DrawResponse {
	const start = clock()
	const points = rasterize(request)
	const elapsed = Number(clock() - start)

	return { points, elapsed }
}
