/**
 * @rasterkit/draw - Line, circle and curve rasterizers
 * Pure TypeScript, zero dependencies
 */

export * from './types'
export * from './line'
export * from './circle'
export * from './curve'
export * from './wu'
export * from './canvas'
export * from './pnm'
