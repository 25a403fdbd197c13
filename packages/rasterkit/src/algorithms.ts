import {
	type Algorithm,
	type CircleRequest,
	type DrawRequest,
	type LineRequest,
	type Primitive,
	type RasterResult,
	UnsupportedAlgorithmError,
} from '@rasterkit/core'
import {
	bresenhamCircle,
	bresenhamLine,
	CURVE_SEGMENTS,
	ddaLine,
	deCasteljauCurve,
	stepwiseLine,
	wuLine,
} from '@rasterkit/draw'

/**
 * Algorithm metadata
 */
export interface AlgorithmInfo {
	readonly name: Algorithm
	/** Alternative names accepted by the dispatcher */
	readonly aliases: readonly string[]
	readonly primitive: Primitive
	readonly antialiased: boolean
	readonly description: string
}

interface AlgorithmEntry extends AlgorithmInfo {
	readonly run: (req: DrawRequest) => RasterResult
	/** Upper bound on the number of samples run() returns */
	readonly samples: (req: DrawRequest) => number
}

/**
 * Samples along a line: one per step of the major axis
 */
export function lineSampleCount(line: LineRequest): number {
	return Math.max(Math.abs(line.x2 - line.x1), Math.abs(line.y2 - line.y1)) + 1
}

/**
 * Samples of a midpoint circle: eight per step, about r / sqrt(2) steps
 */
export function circleSampleCount(circle: CircleRequest): number {
	if (circle.r === 0) return 8
	return 8 * (Math.floor(circle.r / Math.SQRT2) + 2)
}

function circleOf(req: DrawRequest): CircleRequest {
	return { xc: req.x1, yc: req.y1, r: req.r }
}

/**
 * Algorithm registry, in display order.
 * Circles are centered on (x1, y1); curves use all four points.
 */
const REGISTRY: readonly AlgorithmEntry[] = [
	{
		name: 'stepwise',
		aliases: ['step'],
		primitive: 'line',
		antialiased: false,
		description: 'Slope-intercept line, y = kx + b',
		run: (req) => stepwiseLine(req.x1, req.y1, req.x2, req.y2),
		samples: lineSampleCount,
	},
	{
		name: 'dda',
		aliases: [],
		primitive: 'line',
		antialiased: false,
		description: 'Digital differential analyzer line',
		run: (req) => ddaLine(req.x1, req.y1, req.x2, req.y2),
		samples: lineSampleCount,
	},
	{
		name: 'bresenham-line',
		aliases: ['bresenham_line'],
		primitive: 'line',
		antialiased: false,
		description: 'Integer Bresenham line',
		run: (req) => bresenhamLine(req.x1, req.y1, req.x2, req.y2),
		samples: lineSampleCount,
	},
	{
		name: 'bresenham-circle',
		aliases: ['bresenham_circle'],
		primitive: 'circle',
		antialiased: false,
		description: 'Midpoint circle with 8-way symmetry',
		run: (req) => {
			const { xc, yc, r } = circleOf(req)
			return bresenhamCircle(xc, yc, r)
		},
		samples: (req) => circleSampleCount(circleOf(req)),
	},
	{
		name: 'bezier-cubic',
		aliases: ['casteljau'],
		primitive: 'curve',
		antialiased: false,
		description: 'Cubic Bezier by de Casteljau subdivision',
		run: (req) => deCasteljauCurve(req.x1, req.y1, req.x2, req.y2, req.x3, req.y3, req.x4, req.y4),
		samples: () => CURVE_SEGMENTS + 1,
	},
	{
		name: 'wu-antialiased',
		aliases: ['wu'],
		primitive: 'line',
		antialiased: true,
		description: "Xiaolin Wu's antialiased line",
		run: (req) => wuLine(req.x1, req.y1, req.x2, req.y2),
		samples: (req) => 2 * (lineSampleCount(req) + 1),
	},
]

const LOOKUP = new Map<string, AlgorithmEntry>()
for (const entry of REGISTRY) {
	LOOKUP.set(entry.name, entry)
	for (const alias of entry.aliases) {
		LOOKUP.set(alias, entry)
	}
}

/**
 * List supported algorithms
 */
export function listAlgorithms(): AlgorithmInfo[] {
	return REGISTRY.map(({ run: _run, samples: _samples, ...info }) => info)
}

/**
 * Resolve a name or alias to its canonical algorithm
 */
export function resolveAlgorithm(name: string): Algorithm | null {
	return LOOKUP.get(name)?.name ?? null
}

function lookup(algorithm: string): AlgorithmEntry {
	const entry = LOOKUP.get(algorithm)
	if (!entry) {
		throw new UnsupportedAlgorithmError(algorithm)
	}
	return entry
}

/**
 * Upper bound on the samples a request produces, computed without rasterizing.
 * @throws UnsupportedAlgorithmError for unknown names
 */
export function estimateSamples(request: DrawRequest): number {
	return lookup(request.algorithm).samples(request)
}

/**
 * Run the rasterizer named by request.algorithm.
 * @throws UnsupportedAlgorithmError for unknown names
 */
export function rasterize(request: DrawRequest): RasterResult {
	return lookup(request.algorithm).run(request)
}
