import { type Candidate, DEFAULT_PLANNER_CONFIG, type PlannerConfig, type Point, type Polygon } from '@/types/coverage'
import { type AnglePool, createInlinePool } from './anglePool'
import { evaluateAngle, sampleAngles, selectBestCandidate } from './angleOptimizer'
import { InvalidConfigError, InvalidPolygonError, PlanningFailedError } from './errors'
import { centroid, GEOMETRY_EPSILON, polygonArea } from './geometry'

interface ResolvedConfig {
  spacingM: number
  angleSamples: number
  overshootM: number
}

export function resolvePlannerConfig(config: Partial<PlannerConfig> = {}): ResolvedConfig {
  const spacingM = config.spacingM ?? DEFAULT_PLANNER_CONFIG.spacingM
  const angleSamples = config.angleSamples ?? DEFAULT_PLANNER_CONFIG.angleSamples
  const overshootM = config.overshootM ?? spacingM

  if (!Number.isFinite(spacingM) || spacingM <= 0) {
    throw new InvalidConfigError(`Sweep spacing must be a positive number of meters, got ${spacingM}`)
  }
  if (!Number.isInteger(angleSamples) || angleSamples < 1) {
    throw new InvalidConfigError(`Angle samples must be an integer of at least 1, got ${angleSamples}`)
  }
  if (!Number.isFinite(overshootM)) {
    throw new InvalidConfigError(`Sweep overshoot must be finite, got ${overshootM}`)
  }

  return { spacingM, angleSamples, overshootM }
}

// Drop an explicit closing vertex and reject rings the sweep cannot work with
export function normalizePolygon(polygon: Polygon): Point[] {
  const ring = polygon.map(p => ({ x: p.x, y: p.y }))

  if (ring.length > 1) {
    const first = ring[0]
    const last = ring[ring.length - 1]
    if (first.x === last.x && first.y === last.y) {
      ring.pop()
    }
  }

  if (ring.length < 3) {
    throw new InvalidPolygonError(`Polygon must have at least 3 vertices, got ${ring.length}`)
  }
  if (ring.some(p => !Number.isFinite(p.x) || !Number.isFinite(p.y))) {
    throw new InvalidPolygonError('Polygon vertices must be finite numbers')
  }
  if (Math.abs(polygonArea(ring)) <= GEOMETRY_EPSILON) {
    throw new InvalidPolygonError('Polygon is empty (zero area)')
  }

  return ring
}

// Best orientation with its angle and length
export function planCoverageCandidate(polygon: Polygon, config: Partial<PlannerConfig> = {}): Candidate {
  const ring = normalizePolygon(polygon)
  const { spacingM, angleSamples, overshootM } = resolvePlannerConfig(config)
  const pivot = centroid(ring)

  const candidates = sampleAngles(angleSamples).map(angle =>
    evaluateAngle(ring, angle, pivot, spacingM, overshootM)
  )

  const best = selectBestCandidate(candidates)
  if (!best) {
    throw new PlanningFailedError()
  }
  return best
}

// Boustrophedon coverage path over a simple polygon in planar meters: the
// shortest route over angleSamples sweep orientations in [0, 180)
export function planCoverage(polygon: Polygon, config: Partial<PlannerConfig> = {}): Point[] {
  return [...planCoverageCandidate(polygon, config).path]
}

async function foldPool(
  ring: Point[],
  pivot: Point,
  config: ResolvedConfig,
  pool: AnglePool
): Promise<Candidate> {
  const { spacingM, angleSamples, overshootM } = config
  const candidates = await Promise.all(
    sampleAngles(angleSamples).map(angle =>
      pool.run({ polygon: [...ring], pivot, angle, spacingM, overshootM })
    )
  )

  const best = selectBestCandidate(candidates)
  if (!best) {
    throw new PlanningFailedError()
  }
  return best
}

// Same result as planCoverageCandidate, with the angles evaluated through a pool.
// Polygon and config errors throw before any work is queued.
export function planCoverageParallel(
  polygon: Polygon,
  config: Partial<PlannerConfig> = {},
  pool: AnglePool = createInlinePool()
): Promise<Candidate> {
  const ring = normalizePolygon(polygon)
  const resolved = resolvePlannerConfig(config)
  return foldPool(ring, centroid(ring), resolved, pool)
}
