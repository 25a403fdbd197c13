/**
 * Cubic Bezier curves
 */

import { type RasterResult, roundHalfAwayFromZero, sample } from '@rasterkit/core'

/** Parameter step between samples */
export const CURVE_STEP = 0.005

/** Number of parameter intervals; the curve has CURVE_SEGMENTS + 1 samples */
export const CURVE_SEGMENTS = Math.round(1 / CURVE_STEP)

function lerp(a: number, b: number, t: number): number {
	return a + (b - a) * t
}

/**
 * Evaluate a cubic Bezier with de Casteljau's algorithm at t = 0, 0.005, ..., 1.
 * Samples are evenly spaced in t, not in arc length.
 */
export function deCasteljauCurve(
	x1: number,
	y1: number,
	x2: number,
	y2: number,
	x3: number,
	y3: number,
	x4: number,
	y4: number
): RasterResult {
	const points: RasterResult = []

	for (let i = 0; i <= CURVE_SEGMENTS; i++) {
		const t = i / CURVE_SEGMENTS

		const q0x = lerp(x1, x2, t)
		const q0y = lerp(y1, y2, t)
		const q1x = lerp(x2, x3, t)
		const q1y = lerp(y2, y3, t)
		const q2x = lerp(x3, x4, t)
		const q2y = lerp(y3, y4, t)

		const r0x = lerp(q0x, q1x, t)
		const r0y = lerp(q0y, q1y, t)
		const r1x = lerp(q1x, q2x, t)
		const r1y = lerp(q1y, q2y, t)

		points.push(
			sample(roundHalfAwayFromZero(lerp(r0x, r1x, t)), roundHalfAwayFromZero(lerp(r0y, r1y, t)))
		)
	}

	return points
}
