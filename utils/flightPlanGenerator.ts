import type { Candidate, Coordinate, CoveragePlan, PlannerConfig, Point } from '@/types/coverage'
import type { AnglePool } from './anglePool'
import { planCoverageCandidate, planCoverageParallel } from './coveragePlanner'
import { InvalidPolygonError } from './errors'
import { isSimpleRing, repairPolygon } from './polygonRepair'
import { createMercatorProjector, MAX_MERCATOR_LATITUDE, type Projector } from './projection'

// Compass bearing of the sweep lines for a planner rotation angle, in [0, 180)
export function sweepHeading(angle: number): number {
  return (180 - angle) % 180
}

function dropClosingCoordinate(coordinates: Coordinate[]): Coordinate[] {
  if (coordinates.length < 2) return coordinates
  const first = coordinates[0]
  const last = coordinates[coordinates.length - 1]
  return first.lat === last.lat && first.lng === last.lng ? coordinates.slice(0, -1) : coordinates
}

interface PreparedSurvey {
  planar: Point[]
  projector: Projector
  repaired: boolean
}

// Validate, project to local meters and repair self-intersecting rings
function prepareSurvey(coordinates: Coordinate[]): PreparedSurvey {
  const ring = dropClosingCoordinate(coordinates)

  if (ring.length < 3) {
    throw new InvalidPolygonError(`Polygon must have at least 3 vertices, got ${ring.length}`)
  }

  for (const { lat, lng } of ring) {
    if (!Number.isFinite(lat) || !Number.isFinite(lng) ||
        Math.abs(lat) > MAX_MERCATOR_LATITUDE || Math.abs(lng) > 180) {
      throw new InvalidPolygonError(`Invalid coordinate: lat=${lat}, lng=${lng}`)
    }
  }

  const referenceLat = ring.reduce((sum, c) => sum + c.lat, 0) / ring.length
  const projector = createMercatorProjector(referenceLat)

  const planar = ring.map(c => projector.forward(c))
  if (isSimpleRing(planar)) {
    return { planar, projector, repaired: false }
  }

  console.warn('⚠️ Survey polygon is self-intersecting, repairing before planning')
  const repaired = repairPolygon(planar)
  if (repaired.length === 0) {
    throw new InvalidPolygonError('Polygon is empty after repair')
  }
  return { planar: repaired, projector, repaired: true }
}

function toCoveragePlan(best: Candidate, survey: PreparedSurvey): CoveragePlan {
  const projectedPath = [...best.path]
  return {
    waypoints: projectedPath.map(p => survey.projector.inverse(p)),
    projectedPath,
    angle: best.angle,
    heading: sweepHeading(best.angle),
    length: best.length,
    repaired: survey.repaired
  }
}

// Project to local meters, repair a self-intersecting ring, plan, project back
export function generateCoveragePath(
  coordinates: Coordinate[],
  config: Partial<PlannerConfig> = {}
): CoveragePlan {
  const survey = prepareSurvey(coordinates)
  return toCoveragePlan(planCoverageCandidate(survey.planar, config), survey)
}

// Same plan, with the sweep orientations evaluated through an angle pool.
// Polygon and config errors throw synchronously, as in generateCoveragePath.
export function generateCoveragePathParallel(
  coordinates: Coordinate[],
  config: Partial<PlannerConfig> = {},
  pool?: AnglePool
): Promise<CoveragePlan> {
  const survey = prepareSurvey(coordinates)
  return planCoverageParallel(survey.planar, config, pool).then(best => toCoveragePlan(best, survey))
}
