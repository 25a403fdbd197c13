/**
 * A rasterized pixel.
 * Coordinates are integers; alpha is the coverage in [0, 1]
 * (1 for every algorithm except the antialiased line).
 */
export interface PixelSample {
	readonly x: number
	readonly y: number
	readonly alpha: number
}

/**
 * Ordered rasterizer output, in generation order
 */
export type RasterResult = PixelSample[]

/** Line segment between two integer endpoints (any direction) */
export interface LineRequest {
	readonly x1: number
	readonly y1: number
	readonly x2: number
	readonly y2: number
}

/** Circle around an integer center */
export interface CircleRequest {
	readonly xc: number
	readonly yc: number
	readonly r: number
}

/**
 * Canonical algorithm names
 */
export type Algorithm =
	| 'stepwise'
	| 'dda'
	| 'bresenham-line'
	| 'bresenham-circle'
	| 'bezier-cubic'
	| 'wu-antialiased'

/** Geometric primitive an algorithm draws */
export type Primitive = 'line' | 'circle' | 'curve'

/**
 * Draw request as accepted at the service boundary.
 * The circle center is (x1, y1); fields an algorithm does not use are ignored.
 */
export interface DrawRequest {
	readonly algorithm: string
	readonly x1: number
	readonly y1: number
	readonly x2: number
	readonly y2: number
	readonly x3: number
	readonly y3: number
	readonly x4: number
	readonly y4: number
	readonly r: number
}

/**
 * Draw response
 */
export interface DrawResponse {
	readonly points: RasterResult
	readonly elapsed: number // nanoseconds
}

/**
 * Raw image data in RGBA format
 * Each pixel is 4 bytes: R, G, B, A (0-255)
 */
export interface ImageData {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGBA, length = width * height * 4
}
