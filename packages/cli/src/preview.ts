/**
 * ASCII preview of rasterized samples
 */

import { type PixelSample, sampleBounds } from 'rasterkit'

/**
 * Character for a coverage value
 */
export function shade(alpha: number): string {
	if (alpha >= 0.75) return '#'
	if (alpha >= 0.5) return '+'
	if (alpha > 0) return '.'
	return ' '
}

/**
 * Render samples as text, one line per pixel row with y increasing downward.
 * Overlapping samples keep their highest coverage; trailing blanks are trimmed.
 */
export function renderPreview(samples: readonly PixelSample[]): string {
	const bounds = sampleBounds(samples)
	if (!bounds) return ''

	const width = bounds.maxX - bounds.minX + 1
	const height = bounds.maxY - bounds.minY + 1
	const coverage = new Float64Array(width * height)

	for (const s of samples) {
		const idx = (s.y - bounds.minY) * width + (s.x - bounds.minX)
		coverage[idx] = Math.max(coverage[idx] ?? 0, s.alpha)
	}

	const lines: string[] = []
	for (let row = 0; row < height; row++) {
		let line = ''
		for (let col = 0; col < width; col++) {
			line += shade(coverage[row * width + col] ?? 0)
		}
		lines.push(line.trimEnd())
	}

	return lines.join('\n')
}
