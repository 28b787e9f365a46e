import type { BoundingBox, Point, Polygon, Segment } from '@/types/coverage'

// Chords shorter than this are touching points, not coverage
export const GEOMETRY_EPSILON = 1e-9

// Signed area using the shoelace formula, positive for counter-clockwise rings
export function polygonArea(polygon: Polygon): number {
  if (polygon.length < 3) return 0

  // Shift to the first vertex so large projected coordinates keep their precision
  const origin = polygon[0]
  let area = 0
  const n = polygon.length

  for (let i = 0; i < n; i++) {
    const a = polygon[i]
    const b = polygon[(i + 1) % n]
    area += (a.x - origin.x) * (b.y - origin.y) - (b.x - origin.x) * (a.y - origin.y)
  }

  return area / 2
}

// Area-weighted centroid, falls back to the vertex mean for zero-area rings
export function centroid(polygon: Polygon): Point {
  if (polygon.length === 0) {
    return { x: 0, y: 0 }
  }

  const origin = polygon[0]
  const n = polygon.length
  let twiceArea = 0
  let cx = 0
  let cy = 0

  for (let i = 0; i < n; i++) {
    const ax = polygon[i].x - origin.x
    const ay = polygon[i].y - origin.y
    const bx = polygon[(i + 1) % n].x - origin.x
    const by = polygon[(i + 1) % n].y - origin.y
    const cross = ax * by - bx * ay
    twiceArea += cross
    cx += (ax + bx) * cross
    cy += (ay + by) * cross
  }

  if (Math.abs(twiceArea) <= GEOMETRY_EPSILON) {
    const sum = polygon.reduce((acc, p) => ({ x: acc.x + p.x, y: acc.y + p.y }), { x: 0, y: 0 })
    return { x: sum.x / n, y: sum.y / n }
  }

  return {
    x: origin.x + cx / (3 * twiceArea),
    y: origin.y + cy / (3 * twiceArea)
  }
}

// Rotate points counter-clockwise about origin.
// Written as an affine transform so that a zero angle returns the input unchanged.
export function rotate(points: readonly Point[], angleDegrees: number, origin: Point): Point[] {
  const radians = angleDegrees * Math.PI / 180
  const cos = Math.cos(radians)
  const sin = Math.sin(radians)
  const xOffset = origin.x - origin.x * cos + origin.y * sin
  const yOffset = origin.y - origin.x * sin - origin.y * cos

  return points.map(p => ({
    x: p.x * cos - p.y * sin + xOffset,
    y: p.x * sin + p.y * cos + yOffset
  }))
}

export function boundingBox(polygon: Polygon): BoundingBox {
  if (polygon.length === 0) {
    return { minX: 0, minY: 0, maxX: 0, maxY: 0 }
  }

  let minX = polygon[0].x
  let minY = polygon[0].y
  let maxX = polygon[0].x
  let maxY = polygon[0].y

  for (const p of polygon) {
    minX = Math.min(minX, p.x)
    minY = Math.min(minY, p.y)
    maxX = Math.max(maxX, p.x)
    maxY = Math.max(maxY, p.y)
  }

  return { minX, minY, maxX, maxY }
}

export function distance(a: Point, b: Point): number {
  return Math.hypot(b.x - a.x, b.y - a.y)
}

export function pathLength(points: readonly Point[]): number {
  let total = 0
  for (let i = 1; i < points.length; i++) {
    total += distance(points[i - 1], points[i])
  }
  return total
}

// y where edge a-b crosses x, exact at the endpoints
function crossingY(a: Point, b: Point, x: number): number {
  if (x === a.x) return a.y
  if (x === b.x) return b.y
  return a.y + (x - a.x) * (b.y - a.y) / (b.x - a.x)
}

// Chords of the vertical line x inside the polygon, clipped to [yMin, yMax], bottom first.
// An edge crosses when min(x) <= line < max(x), so a line through a vertex counts once
// and vertical edges never count. Zero-length chords are dropped, touching ones joined.
export function intersectVerticalLine(
  polygon: Polygon,
  x: number,
  yMin: number,
  yMax: number
): Segment[] {
  const crossings: number[] = []
  const n = polygon.length

  for (let i = 0; i < n; i++) {
    const a = polygon[i]
    const b = polygon[(i + 1) % n]
    const lo = Math.min(a.x, b.x)
    const hi = Math.max(a.x, b.x)
    if (x < lo || x >= hi) continue
    crossings.push(crossingY(a, b, x))
  }

  crossings.sort((p, q) => p - q)

  const spans: Array<{ lo: number; hi: number }> = []
  for (let i = 0; i + 1 < crossings.length; i += 2) {
    const lo = Math.max(crossings[i], yMin)
    const hi = Math.min(crossings[i + 1], yMax)
    if (hi - lo <= GEOMETRY_EPSILON) continue

    const previous = spans[spans.length - 1]
    if (previous && lo - previous.hi <= GEOMETRY_EPSILON) {
      previous.hi = hi
    } else {
      spans.push({ lo, hi })
    }
  }

  return spans.map(span => ({
    top: { x, y: span.hi },
    bottom: { x, y: span.lo }
  }))
}
