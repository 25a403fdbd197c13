/**
 * @rasterkit/core - Shared types, geometry helpers and errors
 * Pure TypeScript, zero dependencies
 */

export * from './types'
export * from './geometry'
export * from './errors'
