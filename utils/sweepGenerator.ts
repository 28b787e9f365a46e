import type { BoundingBox, Polygon, SweepLine } from '@/types/coverage'
import { InvalidConfigError } from './errors'
import { boundingBox, intersectVerticalLine } from './geometry'

// Upper bound on sweep lines per orientation. A spacing this fine for the
// area is a unit mistake, not a survey.
export const MAX_SWEEP_LINES = 100000

// Sweep line offsets across the bounding box, one overshoot beyond each side
// so the outermost lines start outside the shape
export function sweepOffsets(bounds: BoundingBox, spacingM: number, overshootM: number = spacingM): number[] {
  const start = bounds.minX - overshootM
  const end = bounds.maxX + overshootM

  if ((end - start) / spacingM >= MAX_SWEEP_LINES || start + spacingM === start) {
    throw new InvalidConfigError(
      `Sweep spacing ${spacingM} m is too fine for a ${end - start} m wide area (limit ${MAX_SWEEP_LINES} lines)`
    )
  }

  // By index, so rounding does not accumulate across the sweep
  const offsets: number[] = []
  for (let i = 0; start + i * spacingM <= end; i++) {
    offsets.push(start + i * spacingM)
  }

  return offsets
}

// Probe the polygon with vertical lines. Lines that miss it are dropped.
export function generateSweepLines(polygon: Polygon, spacingM: number, overshootM: number = spacingM): SweepLine[] {
  const bounds = boundingBox(polygon)
  const yMin = bounds.minY - overshootM
  const yMax = bounds.maxY + overshootM

  const lines: SweepLine[] = []
  for (const x of sweepOffsets(bounds, spacingM, overshootM)) {
    const segments = intersectVerticalLine(polygon, x, yMin, yMax)
    if (segments.length > 0) {
      lines.push({ x, segments })
    }
  }

  return lines
}
