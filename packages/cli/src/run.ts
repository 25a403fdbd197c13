/**
 * rasterkit CLI - rasterize a primitive from the shell
 */

import { extname } from 'node:path'
import {
	type DrawResponse,
	draw,
	drawRequest,
	encodePgm,
	encodePpm,
	type ImageData,
	isRasterkitError,
	listAlgorithms,
	renderSamples,
	resolveAlgorithm,
} from 'rasterkit'
import { parseArgs } from './args'
import { renderPreview } from './preview'

export const VERSION = '0.1.0'

export const HELP = `
rasterkit - Classical rasterization algorithms

USAGE:
  rasterkit <algorithm> [geometry] [options]
  rasterkit --list

GEOMETRY:
  --x1 <n> --y1 <n>     First point (circle center)
  --x2 <n> --y2 <n>     Second point
  --x3 <n> --y3 <n>     Third control point (curves)
  --x4 <n> --y4 <n>     Fourth control point (curves)
  --r <n>               Circle radius

OPTIONS:
  -f, --format <fmt>    Output: json (default) or preview
  -p, --preview         Same as --format preview
  -o, --out <file>      Also write an image (.ppm or .pgm)
  --time                Print elapsed nanoseconds to stderr
  -q, --quiet           Suppress stdout output
  -l, --list            List algorithms
  -h, --help            Show this help
  -V, --version         Show version

EXAMPLES:
  rasterkit bresenham-line --x2 12 --y2 5
  rasterkit wu-antialiased --x2 20 --y2 7 --preview
  rasterkit bresenham-circle --x1 0 --y1 0 --r 8 -o circle.pgm
  rasterkit bezier-cubic --y2 40 --x3 40 --y3 40 --x4 40 --preview
`

/**
 * Console and filesystem access used by the CLI
 */
export interface CliIO {
	stdout: (line: string) => void
	stderr: (line: string) => void
	writeFile: (path: string, data: Uint8Array) => void
}

function encodeImage(path: string, image: ImageData): Uint8Array {
	switch (extname(path).toLowerCase()) {
		case '.ppm':
			return encodePpm(image)
		case '.pgm':
			return encodePgm(image)
		default:
			throw new Error(`Unsupported image extension: ${path} (use .ppm or .pgm)`)
	}
}

function formatList(): string {
	const width = Math.max(...listAlgorithms().map((a) => a.name.length))
	return listAlgorithms()
		.map((a) => {
			const aliases = a.aliases.length > 0 ? ` (alias: ${a.aliases.join(', ')})` : ''
			return `  ${a.name.padEnd(width)}  ${a.primitive.padEnd(6)}  ${a.description}${aliases}`
		})
		.join('\n')
}

/**
 * Run the CLI and return the process exit code
 */
export function run(argv: string[], io: CliIO): number {
	let parsed: ReturnType<typeof parseArgs>

	try {
		parsed = parseArgs(argv)
	} catch (err) {
		io.stderr(`Error: ${err instanceof Error ? err.message : String(err)}`)
		return 1
	}

	const { algorithm, options } = parsed

	if (options.help || (algorithm === undefined && !options.list && !options.version)) {
		io.stdout(HELP)
		return 0
	}

	if (options.version) {
		io.stdout(`rasterkit v${VERSION}`)
		return 0
	}

	if (options.list) {
		io.stdout(formatList())
		return 0
	}

	const name = algorithm ?? ''
	if (resolveAlgorithm(name) === null) {
		io.stderr(`Error: Unknown algorithm: ${name} (see --list)`)
		return 1
	}

	let response: DrawResponse
	try {
		response = draw(drawRequest(name, options.fields))
	} catch (err) {
		if (isRasterkitError(err)) {
			io.stderr(`Error: ${err.message}`)
			return 1
		}
		throw err
	}

	if (!options.quiet) {
		io.stdout(options.format === 'preview' ? renderPreview(response.points) : JSON.stringify(response.points))
	}

	if (options.time) {
		io.stderr(`elapsed: ${response.elapsed} ns (${response.points.length} points)`)
	}

	if (options.out) {
		try {
			io.writeFile(options.out, encodeImage(options.out, renderSamples(response.points)))
		} catch (err) {
			io.stderr(`Error: ${err instanceof Error ? err.message : String(err)}`)
			return 1
		}
	}

	return 0
}
