import type { Coordinates } from '../../src/types'
import { EARTH_RADIUS_KM } from '../../src/services/geo'

export const JOHANNESBURG: Coordinates = { latitude: -26.2041, longitude: 28.0473 }

/**
 * Point `km` kilometers due north of `origin`. Along a meridian the
 * haversine distance equals the arc length, so the offset is exact.
 */
export function northOf(origin: Coordinates, km: number): Coordinates {
  return {
    latitude: origin.latitude + (km / EARTH_RADIUS_KM) * (180 / Math.PI),
    longitude: origin.longitude,
  }
}

/** A fixed instant on 2026-03-14 (UTC), `hour` hours after midnight */
export function at(hour: number, minute: number = 0, day: string = '2026-03-14'): Date {
  return new Date(`${day}T${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}:00.000Z`)
}

/** Clock whose current time the test moves */
export function testClock(start: Date) {
  let current = start
  return {
    now: () => current,
    set: (next: Date) => {
      current = next
    },
  }
}
