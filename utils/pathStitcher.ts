import type { Point, Segment, SweepLine } from '@/types/coverage'

function meanY(segment: Segment): number {
  return (segment.top.y + segment.bottom.y) / 2
}

// Top of the shape first. Array.prototype.sort is stable, so equal midpoints
// keep their discovery order.
export function orderSegments(segments: readonly Segment[]): Segment[] {
  return [...segments].sort((a, b) => meanY(b) - meanY(a))
}

// entry, exit, entry, exit... with every segment flown top to bottom
export function flattenSweepLine(line: SweepLine): Point[] {
  const points: Point[] = []
  for (const segment of orderSegments(line.segments)) {
    points.push(segment.top, segment.bottom)
  }
  return points
}

// Join sweep lines (already in increasing x) into one serpentine route:
// down the first line, up the next, down the one after...
export function stitchSweepLines(lines: readonly SweepLine[]): Point[] {
  const path: Point[] = []
  let stripIndex = 0

  for (const line of lines) {
    const points = flattenSweepLine(line)
    if (points.length === 0) continue

    if (stripIndex % 2 === 1) {
      points.reverse()
    }
    path.push(...points)
    stripIndex++
  }

  return path
}
