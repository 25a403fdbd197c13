/**
 * rasterkit - Classical rasterization algorithms by name
 *
 * Zero external dependencies.
 */

// Re-export core types and utilities
export * from '@rasterkit/core'

// Re-export rasterizers
export * from '@rasterkit/draw'

// Main API
export {
	circleSampleCount,
	estimateSamples,
	lineSampleCount,
	listAlgorithms,
	rasterize,
	resolveAlgorithm,
	type AlgorithmInfo,
} from './algorithms'
export { checkSampleLimit, drawRequest, parseDrawRequest } from './request'
export { draw, type Clock } from './draw'
