/**
 * Rounding and fractional-part helpers shared by the rasterizers
 */

import type { PixelSample } from './types'

/**
 * Round to nearest integer, ties away from zero (2.5 -> 3, -2.5 -> -3)
 */
export function roundHalfAwayFromZero(v: number): number {
	return v < 0 ? -Math.round(-v) : Math.round(v)
}

/**
 * Round to nearest integer, ties toward +Infinity
 */
export function roundHalfUp(v: number): number {
	return Math.floor(v + 0.5)
}

/**
 * Integer part (floor, so -1.25 -> -2)
 */
export function ipart(v: number): number {
	return Math.floor(v)
}

/**
 * Fractional part relative to floor, always in [0, 1)
 */
export function fpart(v: number): number {
	return v - Math.floor(v)
}

/**
 * Complement of the fractional part
 */
export function rfpart(v: number): number {
	return 1 - fpart(v)
}

/**
 * Clamp value to [min, max]
 */
export function clamp(v: number, min: number, max: number): number {
	if (v < min) return min
	if (v > max) return max
	return v
}

/**
 * Build a pixel sample. -0 is normalized to 0.
 */
export function sample(x: number, y: number, alpha = 1): PixelSample {
	return { x: x === 0 ? 0 : x, y: y === 0 ? 0 : y, alpha }
}
