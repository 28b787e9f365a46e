import type { Coordinate, Point } from '@/types/coverage'

// Spherical Web Mercator (EPSG:3857)
const EARTH_RADIUS = 6378137
export const MAX_MERCATOR_LATITUDE = 85.0511287798

export interface Projector {
  forward(coordinate: Coordinate): Point
  inverse(point: Point): Coordinate
}

const toRadians = (degrees: number) => degrees * Math.PI / 180
const toDegrees = (radians: number) => radians * 180 / Math.PI

// Web Mercator scaled by cos(referenceLat): one planar unit is one ground meter
// around the reference latitude
export function createMercatorProjector(referenceLat: number = 0): Projector {
  if (!Number.isFinite(referenceLat) || Math.abs(referenceLat) > MAX_MERCATOR_LATITUDE) {
    throw new RangeError(`Reference latitude ${referenceLat} is outside the Mercator range`)
  }

  const radius = EARTH_RADIUS * Math.cos(toRadians(referenceLat))

  return {
    forward({ lat, lng }) {
      if (!Number.isFinite(lat) || Math.abs(lat) > MAX_MERCATOR_LATITUDE) {
        throw new RangeError(`Latitude ${lat} is outside the Mercator range`)
      }
      return {
        x: radius * toRadians(lng),
        y: radius * Math.log(Math.tan(Math.PI / 4 + toRadians(lat) / 2))
      }
    },

    inverse({ x, y }) {
      return {
        lat: toDegrees(2 * Math.atan(Math.exp(y / radius)) - Math.PI / 2),
        lng: toDegrees(x / radius)
      }
    }
  }
}
