// Polygon repair using polygon-clipping library

import polygonClipping from 'polygon-clipping'
import type { MultiPolygon, Ring } from 'polygon-clipping'
import type { Point, Polygon } from '@/types/coverage'
import { polygonArea } from './geometry'

function orientation(a: Point, b: Point, c: Point): number {
  const value = (b.x - a.x) * (c.y - a.y) - (b.y - a.y) * (c.x - a.x)
  return value > 0 ? 1 : value < 0 ? -1 : 0
}

function onSegment(a: Point, b: Point, p: Point): boolean {
  return p.x >= Math.min(a.x, b.x) && p.x <= Math.max(a.x, b.x) &&
    p.y >= Math.min(a.y, b.y) && p.y <= Math.max(a.y, b.y)
}

function segmentsIntersect(p1: Point, p2: Point, q1: Point, q2: Point): boolean {
  const o1 = orientation(p1, p2, q1)
  const o2 = orientation(p1, p2, q2)
  const o3 = orientation(q1, q2, p1)
  const o4 = orientation(q1, q2, p2)

  if (o1 !== o2 && o3 !== o4) return true

  // Collinear touches
  if (o1 === 0 && onSegment(p1, p2, q1)) return true
  if (o2 === 0 && onSegment(p1, p2, q2)) return true
  if (o3 === 0 && onSegment(q1, q2, p1)) return true
  if (o4 === 0 && onSegment(q1, q2, p2)) return true
  return false
}

// True when no two non-adjacent edges cross or touch. Quadratic in the vertex count.
export function isSimpleRing(ring: Polygon): boolean {
  const n = ring.length
  if (n < 3) return false

  for (let i = 0; i < n; i++) {
    const a1 = ring[i]
    const a2 = ring[(i + 1) % n]
    for (let j = i + 1; j < n; j++) {
      // Adjacent edges share a vertex
      if (j === i + 1 || (i === 0 && j === n - 1)) continue
      const b1 = ring[j]
      const b2 = ring[(j + 1) % n]
      if (segmentsIntersect(a1, a2, b1, b2)) return false
    }
  }

  return true
}

function ringToPoints(ring: Ring): Point[] {
  const points = ring.map(([x, y]) => ({ x, y }))
  const first = points[0]
  const last = points[points.length - 1]
  if (points.length > 1 && first.x === last.x && first.y === last.y) {
    points.pop()
  }
  return points
}

// Union the ring with itself and keep the outer ring of the largest piece.
// Holes are dropped. Empty when nothing survives.
export function repairPolygon(ring: Polygon): Point[] {
  if (ring.length < 3) return []

  const input: Ring = ring.map((p): [number, number] => [p.x, p.y])
  const result: MultiPolygon = polygonClipping.union([input])

  let best: Point[] = []
  let bestArea = 0
  for (const polygon of result) {
    if (polygon.length === 0) continue
    const outer = ringToPoints(polygon[0])
    const area = Math.abs(polygonArea(outer))
    if (area > bestArea) {
      best = outer
      bestArea = area
    }
  }

  return best
}
