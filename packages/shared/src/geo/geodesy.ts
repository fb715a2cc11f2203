/**
 * Geodesy helpers on the WGS-84 sphere approximation.
 *
 * Distances are great-circle (haversine) in metres. Altitudes are relative
 * to the launch point, so 3-D distance simply combines the horizontal
 * great-circle distance with the altitude delta.
 */

import type { GeoPoint } from "../fleet/schemas.js"

/** Mean Earth radius in metres. */
export const EARTH_RADIUS_M = 6_371_000

function toRadians(deg: number): number {
  return (deg * Math.PI) / 180
}

/**
 * Great-circle distance between two points, ignoring altitude.
 */
export function haversineDistance(a: GeoPoint, b: GeoPoint): number {
  const phi1 = toRadians(a.lat)
  const phi2 = toRadians(b.lat)
  const dPhi = toRadians(b.lat - a.lat)
  const dLambda = toRadians(b.lon - a.lon)

  const h =
    Math.sin(dPhi / 2) ** 2 + Math.cos(phi1) * Math.cos(phi2) * Math.sin(dLambda / 2) ** 2
  return 2 * EARTH_RADIUS_M * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h))
}

/**
 * Straight-line distance combining the great-circle distance with the
 * altitude difference. Missing altitudes count as 0.
 */
export function distance3d(a: GeoPoint, b: GeoPoint): number {
  const horizontal = haversineDistance(a, b)
  const vertical = (b.alt ?? 0) - (a.alt ?? 0)
  return Math.sqrt(horizontal ** 2 + vertical ** 2)
}

/**
 * Ray-casting point-in-polygon test in lat/lon space.
 *
 * Adequate for geofences spanning a few kilometres; polygons crossing the
 * antimeridian are not supported. Points exactly on an edge may land on
 * either side.
 */
export function pointInPolygon(point: GeoPoint, polygon: readonly GeoPoint[]): boolean {
  if (polygon.length < 3) return false

  let inside = false
  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    const vi = polygon[i]
    const vj = polygon[j]
    if (!vi || !vj) continue

    const crosses =
      vi.lat > point.lat !== vj.lat > point.lat &&
      point.lon < ((vj.lon - vi.lon) * (point.lat - vi.lat)) / (vj.lat - vi.lat) + vi.lon
    if (crosses) inside = !inside
  }
  return inside
}

/**
 * Total horizontal length of a path through the given points.
 */
export function pathLength(points: readonly GeoPoint[]): number {
  let total = 0
  for (let i = 1; i < points.length; i++) {
    const prev = points[i - 1]
    const next = points[i]
    if (prev && next) total += haversineDistance(prev, next)
  }
  return total
}

/**
 * Offset a point by metres north/east. Used to build fixtures and
 * rally points; accurate to well under a metre for offsets of a few km.
 */
export function offsetPoint(origin: GeoPoint, northMeters: number, eastMeters: number): GeoPoint {
  const dLat = northMeters / EARTH_RADIUS_M
  const dLon = eastMeters / (EARTH_RADIUS_M * Math.cos(toRadians(origin.lat)))
  return {
    lat: origin.lat + (dLat * 180) / Math.PI,
    lon: origin.lon + (dLon * 180) / Math.PI,
    alt: origin.alt,
  }
}
