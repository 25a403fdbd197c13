/**
 * Bresenham (midpoint) circle
 */

import { type RasterResult, sample } from '@rasterkit/core'

/**
 * Push the eight reflections of octant point (x, y) around the center
 */
function pushOctants(points: RasterResult, xc: number, yc: number, x: number, y: number): void {
	points.push(
		sample(xc + x, yc + y),
		sample(xc - x, yc + y),
		sample(xc + x, yc - y),
		sample(xc - x, yc - y),
		sample(xc + y, yc + x),
		sample(xc - y, yc + x),
		sample(xc + y, yc - x),
		sample(xc - y, yc - x)
	)
}

/**
 * Draw a circle outline using the midpoint decision variable.
 * One octant is walked and mirrored; output comes in batches of eight,
 * not sorted by angle. Duplicates (on the axes and diagonals) are kept.
 */
export function bresenhamCircle(xc: number, yc: number, r: number): RasterResult {
	const points: RasterResult = []

	let x = 0
	let y = r
	let d = 3 - 2 * r

	pushOctants(points, xc, yc, x, y)

	// Zero radius: stepping would leave the center
	if (r === 0) return points

	while (y >= x) {
		x++
		if (d > 0) {
			y--
			d += 4 * (x - y) + 10
		} else {
			d += 4 * x + 6
		}
		pushOctants(points, xc, yc, x, y)
	}

	return points
}
