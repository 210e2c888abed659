import type { Coordinates, FraudCategory, FraudVerdict } from '../types'
import { DEFAULT_FRAUD_CONFIG, type FraudConfig, type FraudThresholds } from '../config'
import { distanceKm } from './geo'

export const FRAUD_REASONS = {
  missing: 'insufficient location data',
  invalid: 'invalid location data',
  valid: 'within expected shopping radius',
  review: 'moderate distance between shop and upload location',
  suspicious: 'large distance: possible location spoofing',
  flagged: 'extreme distance: blocked from draw pool',
} as const

/** Severity order used when comparing categories */
export const FRAUD_SEVERITY: Record<FraudCategory, number> = {
  valid: 0,
  review: 1,
  suspicious: 2,
  flagged: 3,
}

/**
 * Location-consistency fraud classifier
 *
 * Compares where the shop is with where the receipt was uploaded from.
 * Thresholds are ascending and the first band that matches wins.
 */
export class FraudClassifier {
  constructor(private readonly config: FraudConfig = DEFAULT_FRAUD_CONFIG) {}

  /**
   * Active distance thresholds (km), for reporting
   */
  get thresholds(): FraudThresholds {
    return { ...this.config.thresholds }
  }

  describeThresholds() {
    const { validKm, reviewKm, suspiciousKm } = this.config.thresholds
    return {
      validKm,
      reviewKm,
      suspiciousKm,
      scores: { ...this.config.scores },
      description: {
        valid: `< ${validKm}km - auto-approved`,
        review: `${validKm}-${reviewKm}km - manual review suggested`,
        suspicious: `${reviewKm}-${suspiciousKm}km - suspicious, excluded from draw`,
        flagged: `> ${suspiciousKm}km - blocked from draw pool`,
      },
    }
  }

  /**
   * Classify a receipt from its shop and upload coordinates.
   * InvalidCoordinateError from the distance computation propagates.
   */
  classify(shop: Coordinates | null, upload: Coordinates | null): FraudVerdict {
    if (!shop || !upload) {
      return this.withoutDistance(FRAUD_REASONS.missing)
    }

    const distance = distanceKm(shop, upload)
    return { ...this.classifyDistance(distance), distanceKm: Math.round(distance * 100) / 100 }
  }

  /**
   * Review verdict for a receipt whose distance cannot be computed
   */
  withoutDistance(reason: string): FraudVerdict {
    return { category: 'review', score: this.config.scores.missing, reason, distanceKm: null }
  }

  classifyDistance(distance: number): Omit<FraudVerdict, 'distanceKm'> {
    const { thresholds, scores } = this.config

    if (distance < thresholds.validKm) {
      return {
        category: 'valid',
        score: Math.round((distance / thresholds.validKm) * scores.validMax),
        reason: FRAUD_REASONS.valid,
      }
    }
    if (distance <= thresholds.reviewKm) {
      return { category: 'review', score: scores.review, reason: FRAUD_REASONS.review }
    }
    if (distance <= thresholds.suspiciousKm) {
      return { category: 'suspicious', score: scores.suspicious, reason: FRAUD_REASONS.suspicious }
    }
    return { category: 'flagged', score: scores.flagged, reason: FRAUD_REASONS.flagged }
  }
}
