import type { Coordinates } from '../types'
import { InvalidCoordinateError, ErrorMessages } from '../utils/errors'

export const EARTH_RADIUS_KM = 6371

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180
}

/**
 * Throws InvalidCoordinateError unless latitude is within [-90, 90]
 * and longitude within [-180, 180]
 */
export function assertCoordinates(point: Coordinates): void {
  const { latitude, longitude } = point

  if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
    throw new InvalidCoordinateError(ErrorMessages.INVALID_COORDINATE, { latitude })
  }
  if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
    throw new InvalidCoordinateError(ErrorMessages.INVALID_COORDINATE, { longitude })
  }
}

export function isValidCoordinates(point: Coordinates): boolean {
  try {
    assertCoordinates(point)
    return true
  } catch {
    return false
  }
}

/**
 * Great-circle distance in kilometers (haversine)
 */
export function distanceKm(a: Coordinates, b: Coordinates): number {
  assertCoordinates(a)
  assertCoordinates(b)

  const lat1 = toRadians(a.latitude)
  const lat2 = toRadians(b.latitude)
  const deltaLat = toRadians(b.latitude - a.latitude)
  const deltaLon = toRadians(b.longitude - a.longitude)

  const h =
    Math.sin(deltaLat / 2) ** 2 +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(deltaLon / 2) ** 2

  return 2 * EARTH_RADIUS_KM * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h))
}
