#!/usr/bin/env node
/**
 * Start the draw API server from environment settings
 */

import { loadServerConfig } from './config'
import { DRAW_PATH } from './handler'
import { createDrawServer, listen } from './server'

async function main(): Promise<void> {
	const config = loadServerConfig()
	const server = createDrawServer(config)

	await listen(server, config)
	console.log(`Server running at http://${config.host}:${config.port}${DRAW_PATH}`)

	const shutdown = (): void => {
		server.close(() => process.exit(0))
	}
	process.once('SIGINT', shutdown)
	process.once('SIGTERM', shutdown)
}

main().catch((err) => {
	console.error('Fatal error:', err)
	process.exit(1)
})
