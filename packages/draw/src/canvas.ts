/**
 * Plotting rasterized samples onto RGBA images
 */

import { clamp, type ImageData, type PixelSample } from '@rasterkit/core'
import type { Bounds, Color, Offset, RenderOptions } from './types'

const BLACK: Color = [0, 0, 0, 255]
const WHITE: Color = [255, 255, 255, 255]

/**
 * Set a pixel color, alpha blending translucent colors
 */
export function setPixel(image: ImageData, x: number, y: number, color: Color): void {
	if (x < 0 || x >= image.width || y < 0 || y >= image.height) return

	const idx = (Math.floor(y) * image.width + Math.floor(x)) * 4
	const [r, g, b, a] = color
	const data = image.data

	if (a === 255) {
		data[idx] = r
		data[idx + 1] = g
		data[idx + 2] = b
		data[idx + 3] = a
	} else {
		const alpha = a / 255
		const invAlpha = 1 - alpha
		data[idx] = Math.round(r * alpha + data[idx]! * invAlpha)
		data[idx + 1] = Math.round(g * alpha + data[idx + 1]! * invAlpha)
		data[idx + 2] = Math.round(b * alpha + data[idx + 2]! * invAlpha)
		data[idx + 3] = Math.max(data[idx + 3]!, a)
	}
}

/**
 * Get a pixel color; out of bounds reads as transparent
 */
export function getPixel(image: ImageData, x: number, y: number): Color {
	if (x < 0 || x >= image.width || y < 0 || y >= image.height) {
		return [0, 0, 0, 0]
	}

	const idx = (Math.floor(y) * image.width + Math.floor(x)) * 4
	const data = image.data
	return [data[idx]!, data[idx + 1]!, data[idx + 2]!, data[idx + 3]!]
}

/**
 * Create a new image filled with a color
 */
export function createImage(width: number, height: number, color: Color = [0, 0, 0, 0]): ImageData {
	const data = new Uint8Array(width * height * 4)
	const [r, g, b, a] = color
	for (let i = 0; i < data.length; i += 4) {
		data[i] = r
		data[i + 1] = g
		data[i + 2] = b
		data[i + 3] = a
	}
	return { width, height, data }
}

/**
 * Bounding box of a sample set, or null when there are no samples
 */
export function sampleBounds(samples: readonly PixelSample[]): Bounds | null {
	if (samples.length === 0) return null

	let minX = Number.POSITIVE_INFINITY
	let minY = Number.POSITIVE_INFINITY
	let maxX = Number.NEGATIVE_INFINITY
	let maxY = Number.NEGATIVE_INFINITY
	for (const s of samples) {
		minX = Math.min(minX, s.x)
		minY = Math.min(minY, s.y)
		maxX = Math.max(maxX, s.x)
		maxY = Math.max(maxY, s.y)
	}

	return { minX, minY, maxX, maxY }
}

/**
 * Plot samples with their coverage scaling the color's alpha.
 * Samples with zero coverage are skipped.
 */
export function plotSamples(
	image: ImageData,
	samples: readonly PixelSample[],
	color: Color = BLACK,
	offset: Offset = { dx: 0, dy: 0 }
): void {
	const [r, g, b, a] = color

	for (const s of samples) {
		const alpha = Math.round(a * clamp(s.alpha, 0, 1))
		if (alpha === 0) continue
		setPixel(image, s.x + offset.dx, s.y + offset.dy, [r, g, b, alpha])
	}
}

/**
 * Render samples into an image just large enough to hold them
 */
export function renderSamples(samples: readonly PixelSample[], options: RenderOptions = {}): ImageData {
	const margin = options.margin ?? 1
	const bounds = sampleBounds(samples) ?? { minX: 0, minY: 0, maxX: -1, maxY: -1 }

	const width = bounds.maxX - bounds.minX + 1 + margin * 2
	const height = bounds.maxY - bounds.minY + 1 + margin * 2
	const image = createImage(width, height, options.background ?? WHITE)

	plotSamples(image, samples, options.color ?? BLACK, {
		dx: margin - bounds.minX,
		dy: margin - bounds.minY,
	})

	return image
}
