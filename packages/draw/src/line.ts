/**
 * Opaque line rasterizers
 */

import { type RasterResult, roundHalfAwayFromZero, sample } from '@rasterkit/core'

/**
 * Draw a line from the explicit equation y = kx + b.
 * Steps along x for shallow lines and along y (x = (y - b) / k) for steep ones.
 */
export function stepwiseLine(x1: number, y1: number, x2: number, y2: number): RasterResult {
	const points: RasterResult = []
	const dx = x2 - x1
	const dy = y2 - y1

	// Vertical: slope undefined
	if (dx === 0) {
		const startY = Math.min(y1, y2)
		const endY = Math.max(y1, y2)
		for (let y = startY; y <= endY; y++) {
			points.push(sample(x1, y))
		}
		return points
	}

	const k = dy / dx
	const b = y1 - k * x1

	if (Math.abs(dx) >= Math.abs(dy)) {
		const step = x2 < x1 ? -1 : 1
		for (let x = x1; x !== x2 + step; x += step) {
			points.push(sample(x, roundHalfAwayFromZero(k * x + b)))
		}
	} else {
		// dx !== 0 and |dy| > |dx| so k !== 0
		const step = y2 < y1 ? -1 : 1
		for (let y = y1; y !== y2 + step; y += step) {
			points.push(sample(roundHalfAwayFromZero((y - b) / k), y))
		}
	}

	return points
}

/**
 * Digital differential analyzer: real-valued increments along the dominant axis
 */
export function ddaLine(x1: number, y1: number, x2: number, y2: number): RasterResult {
	const dx = x2 - x1
	const dy = y2 - y1
	const steps = Math.max(Math.abs(dx), Math.abs(dy))

	if (steps === 0) {
		return [sample(x1, y1)]
	}

	const xInc = dx / steps
	const yInc = dy / steps
	const points: RasterResult = []

	// Absolute position per step rather than a running sum
	for (let i = 0; i <= steps; i++) {
		points.push(
			sample(roundHalfAwayFromZero(x1 + i * xInc), roundHalfAwayFromZero(y1 + i * yInc))
		)
	}

	return points
}

/**
 * Draw a line using Bresenham's algorithm (integer arithmetic only)
 */
export function bresenhamLine(x1: number, y1: number, x2: number, y2: number): RasterResult {
	const points: RasterResult = []

	const dx = Math.abs(x2 - x1)
	const dy = Math.abs(y2 - y1)
	const sx = x1 < x2 ? 1 : -1
	const sy = y1 < y2 ? 1 : -1
	let err = dx - dy
	let x = x1
	let y = y1

	while (true) {
		points.push(sample(x, y))

		if (x === x2 && y === y2) break

		const e2 = 2 * err
		if (e2 > -dy) {
			err -= dy
			x += sx
		}
		if (e2 < dx) {
			err += dx
			y += sy
		}
	}

	return points
}
