export interface Coordinate {
  lat: number
  lng: number
}

// Planar position in meters
export interface Point {
  readonly x: number
  readonly y: number
}

// Closed ring, first vertex implicitly joins the last. Must be simple, no holes.
export type Polygon = readonly Point[]

export interface BoundingBox {
  minX: number
  minY: number
  maxX: number
  maxY: number
}

// One chord of a sweep line inside the polygon
export interface Segment {
  readonly top: Point
  readonly bottom: Point
}

export interface SweepLine {
  x: number
  segments: Segment[]
}

export interface Candidate {
  readonly angle: number // degrees, [0, 180)
  readonly path: readonly Point[] // output frame
  readonly length: number // meters
}

export interface PlannerConfig {
  spacingM: number // distance between adjacent sweep lines
  angleSamples: number // orientations tried over [0, 180)
  overshootM?: number // sweep margin beyond the bounding box, defaults to spacingM
}

export const DEFAULT_PLANNER_CONFIG: PlannerConfig = {
  spacingM: 20,
  angleSamples: 36
}

export interface CoveragePlan {
  waypoints: Coordinate[]
  projectedPath: Point[] // planar meters, same order as waypoints
  angle: number // winning rotation angle, degrees
  heading: number // compass bearing of the sweep lines, [0, 180)
  length: number // meters
  repaired: boolean // input ring was self-intersecting and had to be repaired
}

export interface KMLData {
  name?: string
  description?: string
  coordinates: Coordinate[]
}
