/**
 * Binary PNM encoders for rendered samples
 */

import type { ImageData } from '@rasterkit/core'

function withHeader(header: string, pixelData: Uint8Array): Uint8Array {
	const headerBytes = new TextEncoder().encode(header)
	const output = new Uint8Array(headerBytes.length + pixelData.length)
	output.set(headerBytes, 0)
	output.set(pixelData, headerBytes.length)
	return output
}

/**
 * Encode ImageData to PPM (P6 binary format). Alpha is dropped.
 */
export function encodePpm(image: ImageData): Uint8Array {
	const { width, height, data } = image

	const pixelData = new Uint8Array(width * height * 3)
	let dstIdx = 0
	for (let srcIdx = 0; srcIdx < width * height * 4; srcIdx += 4) {
		pixelData[dstIdx++] = data[srcIdx]!
		pixelData[dstIdx++] = data[srcIdx + 1]!
		pixelData[dstIdx++] = data[srcIdx + 2]!
	}

	return withHeader(`P6\n${width} ${height}\n255\n`, pixelData)
}

/**
 * Encode ImageData to PGM (P5 binary format) using Rec. 601 luminance
 */
export function encodePgm(image: ImageData): Uint8Array {
	const { width, height, data } = image

	const pixelData = new Uint8Array(width * height)
	for (let i = 0; i < width * height; i++) {
		const srcIdx = i * 4
		pixelData[i] = Math.round(
			0.299 * data[srcIdx]! + 0.587 * data[srcIdx + 1]! + 0.114 * data[srcIdx + 2]!
		)
	}

	return withHeader(`P5\n${width} ${height}\n255\n`, pixelData)
}
