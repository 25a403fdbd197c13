/**
 * Xiaolin Wu's antialiased line
 */

import { fpart, ipart, type RasterResult, rfpart, roundHalfUp, sample } from '@rasterkit/core'

/**
 * Draw an antialiased line. Each column (row for steep lines) gets two
 * samples whose coverages sum to 1; the endpoint columns are further
 * weighted by their horizontal gap.
 *
 * Output order: start endpoint pair, end endpoint pair, then the columns
 * in between from left to right.
 */
export function wuLine(x1: number, y1: number, x2: number, y2: number): RasterResult {
	const points: RasterResult = []

	const steep = Math.abs(y2 - y1) > Math.abs(x2 - x1)

	// Work in a shallow, left-to-right frame
	const frame: [number, number, number, number] = steep ? [y1, x1, y2, x2] : [x1, y1, x2, y2]
	const [ax, ay, bx, by]: [number, number, number, number] =
		frame[2] < frame[0] ? [frame[2], frame[3], frame[0], frame[1]] : frame

	const plot = (x: number, y: number, alpha: number): void => {
		points.push(steep ? sample(y, x, alpha) : sample(x, y, alpha))
	}

	const dx = bx - ax
	const dy = by - ay
	const gradient = dx === 0 ? 1 : dy / dx

	// Start endpoint
	const xEnd1 = roundHalfUp(ax)
	const yEnd1 = ay + gradient * (xEnd1 - ax)
	const xGap1 = rfpart(ax + 0.5)
	const xPixel1 = xEnd1
	const yPixel1 = ipart(yEnd1)
	plot(xPixel1, yPixel1, rfpart(yEnd1) * xGap1)
	plot(xPixel1, yPixel1 + 1, fpart(yEnd1) * xGap1)

	let intery = yEnd1 + gradient

	// End endpoint
	const xEnd2 = roundHalfUp(bx)
	const yEnd2 = by + gradient * (xEnd2 - bx)
	const xGap2 = fpart(bx + 0.5)
	const xPixel2 = xEnd2
	const yPixel2 = ipart(yEnd2)
	plot(xPixel2, yPixel2, rfpart(yEnd2) * xGap2)
	plot(xPixel2, yPixel2 + 1, fpart(yEnd2) * xGap2)

	for (let x = xPixel1 + 1; x < xPixel2; x++) {
		plot(x, ipart(intery), rfpart(intery))
		plot(x, ipart(intery) + 1, fpart(intery))
		intery += gradient
	}

	return points
}
