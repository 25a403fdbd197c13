import { afterEach, describe, expect, it, vi } from 'vitest'
import { DEFAULT_CONFIG, createDrawServer, handleRequest, listen, loadServerConfig, type Logger } from './index'

const silentLogger = (): Logger => ({ log: vi.fn(), warn: vi.fn(), error: vi.fn() })

describe('server', () => {
	describe('handleRequest', () => {
		it('should rasterize a POSTed request', () => {
			const body = JSON.stringify({ algorithm: 'bresenham-line', x1: 0, y1: 0, x2: 3, y2: 0 })
			const reply = handleRequest('POST', '/api/draw', body, silentLogger())

			expect(reply.status).toBe(200)
			expect(reply.headers['Content-Type']).toBe('application/json')
			const payload = JSON.parse(reply.body)
			expect(payload.points).toEqual([
				{ x: 0, y: 0, alpha: 1 },
				{ x: 1, y: 0, alpha: 1 },
				{ x: 2, y: 0, alpha: 1 },
				{ x: 3, y: 0, alpha: 1 },
			])
			expect(Number.isInteger(payload.elapsed)).toBe(true)
		})

		it('should report unknown algorithms as client errors', () => {
			const reply = handleRequest('POST', '/api/draw', '{"algorithm":"spiral"}', silentLogger())

			expect(reply.status).toBe(400)
			expect(JSON.parse(reply.body)).toEqual({
				error: 'UNSUPPORTED_ALGORITHM',
				message: 'Unknown algorithm: spiral',
			})
		})

		it('should report invalid fields as client errors', () => {
			const reply = handleRequest('POST', '/api/draw', '{"algorithm":"dda","x1":0.5}', silentLogger())

			expect(reply.status).toBe(400)
			expect(JSON.parse(reply.body)).toEqual({ error: 'INVALID_REQUEST', message: 'x1 must be an integer' })
		})

		it('should reject malformed JSON', () => {
			const reply = handleRequest('POST', '/api/draw', '{"algorithm":', silentLogger())

			expect(reply.status).toBe(400)
			expect(JSON.parse(reply.body).error).toBe('INVALID_JSON')
		})

		it('should only allow POST', () => {
			const reply = handleRequest('GET', '/api/draw', '', silentLogger())

			expect(reply.status).toBe(405)
			expect(reply.headers.Allow).toBe('POST')
			expect(reply.body).toBe('Only POST allowed\n')
		})

		it('should reject requests that would produce too many samples', () => {
			const logger = silentLogger()
			const reply = handleRequest('POST', '/api/draw', '{"algorithm":"bresenham-circle","r":1500000}', logger)

			expect(reply.status).toBe(400)
			expect(JSON.parse(reply.body)).toEqual({
				error: 'INVALID_REQUEST',
				message: 'request would produce up to 8485296 samples (limit 100000)',
			})
			expect(logger.error).not.toHaveBeenCalled()
		})

		it('should apply a configured sample limit', () => {
			const line = (x2: number): string => JSON.stringify({ algorithm: 'bresenham-line', x2 })

			expect(handleRequest('POST', '/api/draw', line(9), silentLogger(), { maxSamples: 10 }).status).toBe(200)

			const reply = handleRequest('POST', '/api/draw', line(10), silentLogger(), { maxSamples: 10 })
			expect(reply.status).toBe(400)
			expect(JSON.parse(reply.body).message).toBe('request would produce up to 11 samples (limit 10)')
		})

		it('should return 404 for other paths', () => {
			expect(handleRequest('POST', '/api/convert', '{}', silentLogger()).status).toBe(404)
		})
	})

	describe('loadServerConfig', () => {
		it('should use defaults for an empty environment', () => {
			expect(loadServerConfig({}, silentLogger())).toEqual(DEFAULT_CONFIG)
		})

		it('should read environment values', () => {
			const config = loadServerConfig(
				{ PORT: '9000', HOST: '127.0.0.1', MAX_BODY_BYTES: '2048', MAX_SAMPLES: '500', VERBOSE: 'true' },
				silentLogger()
			)

			expect(config).toEqual({ port: 9000, host: '127.0.0.1', maxBodyBytes: 2048, maxSamples: 500, verbose: true })
		})

		it('should warn and fall back on invalid numbers', () => {
			const logger = silentLogger()
			const config = loadServerConfig({ PORT: 'eighty', MAX_BODY_BYTES: '-5', MAX_SAMPLES: '0' }, logger)

			expect(config.port).toBe(8083)
			expect(config.maxBodyBytes).toBe(1024 * 1024)
			expect(config.maxSamples).toBe(100_000)
			expect(logger.warn).toHaveBeenCalledWith('Ignoring invalid MAX_SAMPLES=0, using 100000')
			expect(logger.warn).toHaveBeenCalledWith('Ignoring invalid PORT=eighty, using 8083')
			expect(logger.warn).toHaveBeenCalledWith('Ignoring invalid MAX_BODY_BYTES=-5, using 1048576')
		})
	})

	describe('createDrawServer', () => {
		let server: ReturnType<typeof createDrawServer> | undefined

		afterEach(async () => {
			const running = server
			server = undefined
			if (!running) return
			running.closeAllConnections()
			await new Promise<void>((resolve, reject) => running.close((err) => (err ? reject(err) : resolve())))
		})

		const start = async (config: Parameters<typeof createDrawServer>[0], logger: Logger): Promise<string> => {
			server = createDrawServer(config, logger)
			await listen(server, { port: 0, host: '127.0.0.1' })
			const address = server.address()
			if (address === null || typeof address === 'string') {
				throw new Error('Expected a TCP address')
			}
			return `http://127.0.0.1:${address.port}/api/draw`
		}

		it('should serve draw requests over loopback', async () => {
			const logger = silentLogger()
			const url = await start({ verbose: true }, logger)

			const res = await fetch(url, {
				method: 'POST',
				headers: { 'Content-Type': 'application/json' },
				body: JSON.stringify({ algorithm: 'dda', x1: 1, y1: 1, x2: 1, y2: 1 }),
			})

			expect(res.status).toBe(200)
			const payload: unknown = await res.json()
			expect(payload).toEqual({ points: [{ x: 1, y: 1, alpha: 1 }], elapsed: expect.any(Number) })
			expect(logger.log).toHaveBeenCalledWith('POST /api/draw 200')
		})

		it('should pass the configured sample limit to the handler', async () => {
			const url = await start({ maxSamples: 4 }, silentLogger())

			const res = await fetch(url, {
				method: 'POST',
				body: JSON.stringify({ algorithm: 'dda', x2: 4 }),
			})

			expect(res.status).toBe(400)
			const payload: unknown = await res.json()
			expect(payload).toEqual({
				error: 'INVALID_REQUEST',
				message: 'request would produce up to 5 samples (limit 4)',
			})
		})

		it('should reject oversized bodies', async () => {
			const url = await start({ maxBodyBytes: 16 }, silentLogger())

			const res = await fetch(url, {
				method: 'POST',
				body: JSON.stringify({ algorithm: 'bresenham-line', x1: 0, y1: 0, x2: 10, y2: 10 }),
			})

			expect(res.status).toBe(413)
			expect(await res.text()).toBe('Body exceeds 16 bytes\n')
		})
	})
})
