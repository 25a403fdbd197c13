/**
 * Drawing types
 */

/** RGBA color */
export type Color = [number, number, number, number]

/** Inclusive pixel bounds of a sample set */
export interface Bounds {
	minX: number
	minY: number
	maxX: number
	maxY: number
}

/** Translation applied to samples when plotting */
export interface Offset {
	dx: number
	dy: number
}

/** Options for rendering samples into a fresh image */
export interface RenderOptions {
	/** Stroke color; its alpha is scaled by each sample's coverage */
	color?: Color
	/** Background color (default opaque white) */
	background?: Color
	/** Empty border around the samples in pixels (default 1) */
	margin?: number
}
