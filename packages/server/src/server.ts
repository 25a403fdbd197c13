import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http'
import { DEFAULT_CONFIG } from './config'
import { handleRequest, text } from './handler'
import type { HttpReply, Logger, ServerConfig } from './types'

class BodyTooLargeError extends Error {}

/**
 * Collect a request body, rejecting once it exceeds maxBytes
 */
function readBody(req: IncomingMessage, maxBytes: number): Promise<string> {
	return new Promise((resolve, reject) => {
		const chunks: Buffer[] = []
		let size = 0

		req.on('data', (chunk: Buffer) => {
			size += chunk.length
			if (size > maxBytes) {
				reject(new BodyTooLargeError(`Body exceeds ${maxBytes} bytes`))
				req.resume()
				return
			}
			chunks.push(chunk)
		})
		req.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')))
		req.on('error', reject)
	})
}

function send(res: ServerResponse, reply: HttpReply): void {
	res.writeHead(reply.status, reply.headers)
	res.end(reply.body)
}

/**
 * Create an HTTP server for the draw API (not yet listening)
 */
export function createDrawServer(config: Partial<ServerConfig> = {}, logger: Logger = console): Server {
	const { maxBodyBytes, maxSamples, verbose } = { ...DEFAULT_CONFIG, ...config }

	return createServer((req, res) => {
		const method = req.method ?? 'GET'
		const path = new URL(req.url ?? '/', 'http://localhost').pathname

		readBody(req, maxBodyBytes)
			.then((body) => handleRequest(method, path, body, logger, { maxSamples }))
			.catch((err: unknown): HttpReply => {
				if (err instanceof BodyTooLargeError) {
					return text(413, err.message)
				}
				logger.error('Request failed:', err)
				return text(500, 'Internal server error')
			})
			.then((reply) => {
				if (verbose) {
					logger.log(`${method} ${path} ${reply.status}`)
				}
				send(res, reply)
			})
			.catch((err: unknown) => {
				logger.error('Failed to send response:', err)
				res.destroy()
			})
	})
}

/**
 * Start listening; resolves once the port is bound
 */
export function listen(server: Server, config: Pick<ServerConfig, 'port' | 'host'>): Promise<void> {
	return new Promise((resolve, reject) => {
		server.once('error', reject)
		server.listen(config.port, config.host, () => {
			server.off('error', reject)
			resolve()
		})
	})
}
