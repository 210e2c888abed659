import { describe, it, expect } from 'vitest'
import { assertCoordinates, distanceKm, isValidCoordinates } from '../../src/services/geo'
import { InvalidCoordinateError } from '../../src/utils/errors'
import { JOHANNESBURG, northOf } from '../utils/fixtures'

describe('distanceKm', () => {
  it('is zero for the same point', () => {
    expect(distanceKm(JOHANNESBURG, JOHANNESBURG)).toBeLessThan(1e-6)
  })

  it('is symmetric', () => {
    const cape = { latitude: -33.9249, longitude: 18.4241 }
    expect(distanceKm(JOHANNESBURG, cape)).toBeCloseTo(distanceKm(cape, JOHANNESBURG), 9)
  })

  it('measures distance along a meridian', () => {
    expect(distanceKm(JOHANNESBURG, northOf(JOHANNESBURG, 75))).toBeCloseTo(75, 6)
  })

  it('measures a quarter of the equator', () => {
    const quarter = distanceKm({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 90 })
    expect(quarter).toBeCloseTo((Math.PI / 2) * 6371, 6)
  })

  it('handles antipodal points', () => {
    const far = distanceKm({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 180 })
    expect(far).toBeCloseTo(Math.PI * 6371, 6)
  })

  it.each([
    [{ latitude: 90.5, longitude: 0 }],
    [{ latitude: -91, longitude: 0 }],
    [{ latitude: 0, longitude: 181 }],
    [{ latitude: Number.NaN, longitude: 0 }],
    [{ latitude: 0, longitude: Number.POSITIVE_INFINITY }],
  ])('rejects %o', (point) => {
    expect(() => distanceKm(JOHANNESBURG, point)).toThrow(InvalidCoordinateError)
    expect(() => distanceKm(point, JOHANNESBURG)).toThrow(InvalidCoordinateError)
  })
})

describe('assertCoordinates', () => {
  it('accepts the range bounds', () => {
    expect(() => assertCoordinates({ latitude: 90, longitude: -180 })).not.toThrow()
    expect(() => assertCoordinates({ latitude: -90, longitude: 180 })).not.toThrow()
  })

  it('reports the offending value', () => {
    try {
      assertCoordinates({ latitude: 10, longitude: 200 })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidCoordinateError)
      expect(error).toMatchObject({ statusCode: 400, details: { longitude: 200 } })
    }
  })

  it('isValidCoordinates mirrors the check', () => {
    expect(isValidCoordinates(JOHANNESBURG)).toBe(true)
    expect(isValidCoordinates({ latitude: 100, longitude: 0 })).toBe(false)
  })
})
