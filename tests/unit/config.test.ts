import { describe, it, expect } from 'vitest'
import { ZodError } from 'zod'
import { loadConfig } from '../../src/config'

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({})

    expect(config.port).toBe(3001)
    expect(config.defaultCurrency).toBe('ZAR')
    expect(config.fraud.thresholds).toEqual({ validKm: 50, reviewKm: 100, suspiciousKm: 200 })
    expect(config.fraud.scores).toEqual({ validMax: 20, review: 40, suspicious: 70, flagged: 95, missing: 50 })
    expect(config.draw).toEqual({ timeOfDay: 0, catchUpDays: 1, claimTimeoutMs: 600000 })
    expect(config.chat).toEqual({ serviceUrl: undefined, webhookSecret: undefined, locationMaxAgeMinutes: 60 })
    expect(config.ocrServiceUrl).toBeUndefined()
  })

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      DEFAULT_CURRENCY: 'usd',
      FRAUD_VALID_KM: '10',
      FRAUD_REVIEW_KM: '20',
      FRAUD_SUSPICIOUS_KM: '40',
      DRAW_TIME_UTC: '23:30',
      DRAW_CATCH_UP_DAYS: '3',
      CHAT_SERVICE_URL: 'http://chat.local:3002',
      CHAT_WEBHOOK_SECRET: 'test-secret',
    })

    expect(config.port).toBe(8080)
    expect(config.defaultCurrency).toBe('USD')
    expect(config.fraud.thresholds).toEqual({ validKm: 10, reviewKm: 20, suspiciousKm: 40 })
    expect(config.draw.timeOfDay).toBe(1410)
    expect(config.draw.catchUpDays).toBe(3)
    expect(config.chat.serviceUrl).toBe('http://chat.local:3002')
    expect(config.chat.webhookSecret).toBe('test-secret')
  })

  it('treats empty optional URLs as unset', () => {
    expect(loadConfig({ OCR_SERVICE_URL: '', GEOCODER_URL: '  ' }).geocoder.url).toBeUndefined()
  })

  it('rejects thresholds that are not ascending', () => {
    expect(() => loadConfig({ FRAUD_VALID_KM: '120' })).toThrow(/must be ascending/)
    expect(() => loadConfig({ FRAUD_REVIEW_KM: '200' })).toThrow(/must be ascending/)
  })

  it('rejects a malformed draw time', () => {
    expect(() => loadConfig({ DRAW_TIME_UTC: '25:00' })).toThrow(/Invalid DRAW_TIME_UTC/)
  })

  it('rejects malformed values', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(ZodError)
    expect(() => loadConfig({ CHAT_SERVICE_URL: 'not a url' })).toThrow(ZodError)
  })
})
