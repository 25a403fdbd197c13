/**
 * @rasterkit/server - HTTP transport for draw requests
 */

export * from './types'
export * from './config'
export * from './handler'
export * from './server'
