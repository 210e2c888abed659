import { z } from 'zod'
import { parseTimeOfDay } from './utils/dates'

const optionalUrl = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .pipe(z.string().url().optional())
  .optional()

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(3001),
  HOST: z.string().default('0.0.0.0'),
  MONGODB_URI: z.string().default('mongodb://localhost:27017/receipt-rewards'),
  FRONTEND_URL: z.string().default('http://localhost:3000'),
  DEFAULT_CURRENCY: z.string().trim().length(3).default('ZAR'),

  FRAUD_VALID_KM: z.coerce.number().positive().default(50),
  FRAUD_REVIEW_KM: z.coerce.number().positive().default(100),
  FRAUD_SUSPICIOUS_KM: z.coerce.number().positive().default(200),
  FRAUD_VALID_MAX_SCORE: z.coerce.number().min(0).max(100).default(20),
  FRAUD_REVIEW_SCORE: z.coerce.number().min(0).max(100).default(40),
  FRAUD_SUSPICIOUS_SCORE: z.coerce.number().min(0).max(100).default(70),
  FRAUD_FLAGGED_SCORE: z.coerce.number().min(0).max(100).default(95),
  FRAUD_MISSING_SCORE: z.coerce.number().min(0).max(100).default(50),

  DRAW_TIME_UTC: z.string().default('00:00'),
  DRAW_CATCH_UP_DAYS: z.coerce.number().int().min(0).max(31).default(1),
  DRAW_CLAIM_TIMEOUT_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),

  CHAT_SERVICE_URL: optionalUrl,
  CHAT_WEBHOOK_SECRET: z.string().trim().optional(),
  OCR_SERVICE_URL: optionalUrl,
  GEOCODER_URL: optionalUrl,
  GEOCODE_INTERVAL_MINUTES: z.coerce.number().int().min(0).default(60),
  LOCATION_MAX_AGE_MINUTES: z.coerce.number().int().min(0).default(60),
})

export interface FraudThresholds {
  /** Below this distance (km) a receipt is valid */
  validKm: number
  /** Up to and including this distance a receipt needs review */
  reviewKm: number
  /** Up to and including this distance a receipt is suspicious; beyond it is flagged */
  suspiciousKm: number
}

export interface FraudScores {
  validMax: number
  review: number
  suspicious: number
  flagged: number
  missing: number
}

export interface FraudConfig {
  thresholds: FraudThresholds
  scores: FraudScores
}

export interface AppConfig {
  env: string
  port: number
  host: string
  mongoUri: string
  frontendUrl: string
  defaultCurrency: string
  fraud: FraudConfig
  draw: {
    /** Minutes after UTC midnight */
    timeOfDay: number
    catchUpDays: number
    claimTimeoutMs: number
  }
  chat: {
    serviceUrl?: string
    webhookSecret?: string
    locationMaxAgeMinutes: number
  }
  ocrServiceUrl?: string
  geocoder: {
    url?: string
    intervalMinutes: number
  }
}

export const DEFAULT_FRAUD_CONFIG: FraudConfig = {
  thresholds: { validKm: 50, reviewKm: 100, suspiciousKm: 200 },
  scores: { validMax: 20, review: 40, suspicious: 70, flagged: 95, missing: 50 },
}

/**
 * Build the application config from environment variables.
 * Throws when a value is malformed or the fraud thresholds are not ascending.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = EnvSchema.parse(source)

  const thresholds: FraudThresholds = {
    validKm: env.FRAUD_VALID_KM,
    reviewKm: env.FRAUD_REVIEW_KM,
    suspiciousKm: env.FRAUD_SUSPICIOUS_KM,
  }
  if (!(thresholds.validKm < thresholds.reviewKm && thresholds.reviewKm < thresholds.suspiciousKm)) {
    throw new Error(
      `Fraud thresholds must be ascending: FRAUD_VALID_KM (${thresholds.validKm}) < FRAUD_REVIEW_KM (${thresholds.reviewKm}) < FRAUD_SUSPICIOUS_KM (${thresholds.suspiciousKm})`
    )
  }

  const timeOfDay = parseTimeOfDay(env.DRAW_TIME_UTC)
  if (timeOfDay === null) {
    throw new Error(`Invalid DRAW_TIME_UTC '${env.DRAW_TIME_UTC}', expected HH:MM`)
  }

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    host: env.HOST,
    mongoUri: env.MONGODB_URI,
    frontendUrl: env.FRONTEND_URL,
    defaultCurrency: env.DEFAULT_CURRENCY.toUpperCase(),
    fraud: {
      thresholds,
      scores: {
        validMax: env.FRAUD_VALID_MAX_SCORE,
        review: env.FRAUD_REVIEW_SCORE,
        suspicious: env.FRAUD_SUSPICIOUS_SCORE,
        flagged: env.FRAUD_FLAGGED_SCORE,
        missing: env.FRAUD_MISSING_SCORE,
      },
    },
    draw: {
      timeOfDay,
      catchUpDays: env.DRAW_CATCH_UP_DAYS,
      claimTimeoutMs: env.DRAW_CLAIM_TIMEOUT_MS,
    },
    chat: {
      serviceUrl: env.CHAT_SERVICE_URL,
      webhookSecret: env.CHAT_WEBHOOK_SECRET || undefined,
      locationMaxAgeMinutes: env.LOCATION_MAX_AGE_MINUTES,
    },
    ocrServiceUrl: env.OCR_SERVICE_URL,
    geocoder: {
      url: env.GEOCODER_URL,
      intervalMinutes: env.GEOCODE_INTERVAL_MINUTES,
    },
  }
}
