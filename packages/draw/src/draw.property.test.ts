// Property-based checks for the rasterizers

import * as fc from 'fast-check'
import { describe, expect, it } from 'vitest'
import type { PixelSample } from '@rasterkit/core'
import { bresenhamCircle, bresenhamLine, ddaLine, deCasteljauCurve, stepwiseLine, wuLine } from './index'

const coordArb = fc.integer({ min: -200, max: 200 })
const lineArb = fc.tuple(coordArb, coordArb, coordArb, coordArb)
const curveArb = fc.tuple(coordArb, coordArb, coordArb, coordArb, coordArb, coordArb, coordArb, coordArb)

const near = (p: PixelSample | undefined, x: number, y: number): boolean =>
	p !== undefined && Math.abs(p.x - x) <= 1 && Math.abs(p.y - y) <= 1

const pixelSet = (points: PixelSample[]): Set<string> => new Set(points.map((p) => `${p.x},${p.y}`))

describe('rasterizer properties', () => {
	it('bresenham starts and ends exactly on the endpoints', () => {
		fc.assert(
			fc.property(lineArb, ([x1, y1, x2, y2]) => {
				const points = bresenhamLine(x1, y1, x2, y2)
				expect(points[0]).toEqual({ x: x1, y: y1, alpha: 1 })
				expect(points[points.length - 1]).toEqual({ x: x2, y: y2, alpha: 1 })
				expect(points).toHaveLength(Math.max(Math.abs(x2 - x1), Math.abs(y2 - y1)) + 1)
			})
		)
	})

	it('dda starts and ends within one pixel of the endpoints', () => {
		fc.assert(
			fc.property(lineArb, ([x1, y1, x2, y2]) => {
				const points = ddaLine(x1, y1, x2, y2)
				expect(near(points[0], x1, y1)).toBe(true)
				expect(near(points[points.length - 1], x2, y2)).toBe(true)
				expect(points).toHaveLength(Math.max(Math.abs(x2 - x1), Math.abs(y2 - y1)) + 1)
			})
		)
	})

	it('stepwise starts and ends within one pixel of the endpoints', () => {
		fc.assert(
			fc.property(lineArb, ([x1, y1, x2, y2]) => {
				const points = stepwiseLine(x1, y1, x2, y2)
				expect(points).toHaveLength(Math.max(Math.abs(x2 - x1), Math.abs(y2 - y1)) + 1)
				if (x1 === x2) {
					// Vertical lines are emitted bottom-up regardless of direction
					expect(points[0]).toEqual({ x: x1, y: Math.min(y1, y2), alpha: 1 })
					expect(points[points.length - 1]).toEqual({ x: x1, y: Math.max(y1, y2), alpha: 1 })
				} else {
					expect(near(points[0], x1, y1)).toBe(true)
					expect(near(points[points.length - 1], x2, y2)).toBe(true)
				}
			})
		)
	})

	it('bresenham covers the same pixels both ways on axis-aligned and diagonal lines', () => {
		const alignedArb = fc
			.tuple(coordArb, coordArb, fc.integer({ min: -50, max: 50 }), fc.constantFrom('h', 'v', 'd', 'a'))
			.map(([x, y, len, kind]) => {
				switch (kind) {
					case 'h':
						return [x, y, x + len, y] as const
					case 'v':
						return [x, y, x, y + len] as const
					case 'd':
						return [x, y, x + len, y + len] as const
					default:
						return [x, y, x + len, y - len] as const
				}
			})

		fc.assert(
			fc.property(alignedArb, ([x1, y1, x2, y2]) => {
				expect(pixelSet(bresenhamLine(x2, y2, x1, y1))).toEqual(pixelSet(bresenhamLine(x1, y1, x2, y2)))
			})
		)
	})

	it('circle points stay within one pixel inside the radius', () => {
		fc.assert(
			fc.property(coordArb, coordArb, fc.integer({ min: 1, max: 60 }), (xc, yc, r) => {
				for (const p of bresenhamCircle(xc, yc, r)) {
					const dist = Math.round(Math.hypot(p.x - xc, p.y - yc))
					expect(dist === r || dist === r - 1).toBe(true)
				}
			})
		)
	})

	it('curve samples begin and end on the outer control points', () => {
		fc.assert(
			fc.property(curveArb, ([x1, y1, x2, y2, x3, y3, x4, y4]) => {
				const points = deCasteljauCurve(x1, y1, x2, y2, x3, y3, x4, y4)
				expect(points).toHaveLength(201)
				expect(points[0]).toEqual({ x: x1, y: y1, alpha: 1 })
				expect(points[200]).toEqual({ x: x4, y: y4, alpha: 1 })
			})
		)
	})

	it('wu intermediate pairs sum to full coverage', () => {
		fc.assert(
			fc.property(lineArb, ([x1, y1, x2, y2]) => {
				const points = wuLine(x1, y1, x2, y2)
				for (const p of points) {
					expect(p.alpha).toBeGreaterThanOrEqual(0)
					expect(p.alpha).toBeLessThanOrEqual(1)
				}
				// The first four samples are the weighted endpoint pairs
				for (let i = 4; i < points.length; i += 2) {
					const a = points[i]
					const b = points[i + 1]
					expect(a).toBeDefined()
					expect(b).toBeDefined()
					expect(Math.abs((a?.alpha ?? 0) + (b?.alpha ?? 0) - 1)).toBeLessThan(1e-9)
				}
			})
		)
	})

	it('wu keeps full coverage on the main row of horizontal lines', () => {
		fc.assert(
			fc.property(coordArb, coordArb, coordArb, (x1, x2, y) => {
				const points = wuLine(x1, y, x2, y)
				for (let i = 4; i < points.length; i += 2) {
					expect(points[i]?.y).toBe(y)
					expect(points[i]?.alpha).toBe(1)
					expect(points[i + 1]?.alpha).toBe(0)
				}
			})
		)
	})

	it('every rasterizer is idempotent', () => {
		fc.assert(
			fc.property(curveArb, fc.nat({ max: 40 }), ([x1, y1, x2, y2, x3, y3, x4, y4], r) => {
				expect(stepwiseLine(x1, y1, x2, y2)).toEqual(stepwiseLine(x1, y1, x2, y2))
				expect(ddaLine(x1, y1, x2, y2)).toEqual(ddaLine(x1, y1, x2, y2))
				expect(bresenhamLine(x1, y1, x2, y2)).toEqual(bresenhamLine(x1, y1, x2, y2))
				expect(bresenhamCircle(x1, y1, r)).toEqual(bresenhamCircle(x1, y1, r))
				expect(wuLine(x1, y1, x2, y2)).toEqual(wuLine(x1, y1, x2, y2))
				expect(deCasteljauCurve(x1, y1, x2, y2, x3, y3, x4, y4)).toEqual(
					deCasteljauCurve(x1, y1, x2, y2, x3, y3, x4, y4)
				)
			})
		)
	})
})
