import { Types } from 'mongoose'
import type { Pagination } from '../types'

/**
 * Input normalization and validation helpers
 */

/**
 * Validate MongoDB ObjectId
 */
export function isValidObjectId(id: string): boolean {
  return Types.ObjectId.isValid(id)
}

/**
 * Normalize a customer phone number.
 *
 * Separators (spaces, dashes, dots, parentheses) are dropped and a leading
 * international `00` prefix becomes `+`. No country code is inferred, so
 * `0821234567` and `+27821234567` stay distinct customers.
 * Returns null when the result is not 6-15 digits with an optional `+`.
 */
export function normalizePhone(input: string | undefined | null): string | null {
  if (!input) return null

  let phone = input.trim().replace(/[\s\-.()]/g, '')
  if (phone.startsWith('00')) {
    phone = `+${phone.slice(2)}`
  }

  return /^\+?\d{6,15}$/.test(phone) ? phone : null
}

/**
 * Shop identity key: trimmed, whitespace-collapsed, lower-cased
 */
export function normalizeShopName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase()
}

/**
 * Display form of a shop name: trimmed with whitespace collapsed
 */
export function cleanShopName(name: string): string {
  return name.trim().replace(/\s+/g, ' ')
}

/**
 * Sanitize string input (prevent XSS, injection)
 */
export function sanitizeString(input: string, maxLength: number = 500): string {
  if (!input) return ''

  return input
    .trim()
    .replace(/[<>]/g, '')
    .slice(0, maxLength)
}

/**
 * Validate pagination parameters
 */
export function validatePagination(limit?: string | number, offset?: string | number): Pagination {
  const parsedLimit = parseInt(String(limit ?? '50'), 10)
  const parsedOffset = parseInt(String(offset ?? '0'), 10)

  return {
    limit: Number.isNaN(parsedLimit) ? 50 : Math.max(1, Math.min(parsedLimit, 100)),
    offset: Number.isNaN(parsedOffset) ? 0 : Math.max(0, parsedOffset),
  }
}

/**
 * Round a money value to cents
 */
export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100
}
