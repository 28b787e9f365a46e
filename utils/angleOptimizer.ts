import type { Candidate, Point, Polygon } from '@/types/coverage'
import { pathLength, rotate } from './geometry'
import { stitchSweepLines } from './pathStitcher'
import { generateSweepLines } from './sweepGenerator'

// Sweep direction is unoriented, so 180° would repeat 0°
export function sampleAngles(angleSamples: number): number[] {
  const angles: number[] = []
  for (let i = 0; i < angleSamples; i++) {
    angles.push((180 * i) / angleSamples)
  }
  return angles
}

// Rotate by -angle so the sweep lines are vertical, stitch, rotate the path back.
// Null when no sweep line crosses the polygon.
export function evaluateAngle(
  polygon: Polygon,
  angle: number,
  pivot: Point,
  spacingM: number,
  overshootM: number = spacingM
): Candidate | null {
  const working = rotate(polygon, -angle, pivot)
  const lines = generateSweepLines(working, spacingM, overshootM)
  const stitched = stitchSweepLines(lines)
  if (stitched.length === 0) return null

  const path = rotate(stitched, angle, pivot)
  return { angle, path, length: pathLength(path) }
}

// Ordered fold: a candidate replaces the best only when strictly shorter,
// so the lowest angle index wins ties
export function selectBestCandidate(candidates: ReadonlyArray<Candidate | null>): Candidate | null {
  return candidates.reduce<Candidate | null>((best, candidate) => {
    if (candidate === null) return best
    if (best === null || candidate.length < best.length) return candidate
    return best
  }, null)
}
