const DAY_MS = 24 * 60 * 60 * 1000

const DATE_KEY = /^(\d{4})-(\d{2})-(\d{2})$/

/**
 * UTC calendar date of an instant as YYYY-MM-DD
 */
export function toDateKey(date: Date): string {
  return date.toISOString().slice(0, 10)
}

export function isValidDateKey(key: string): boolean {
  const match = DATE_KEY.exec(key)
  if (!match) return false

  const [, year, month, day] = match
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)))
  return toDateKey(date) === key
}

/**
 * Half-open UTC range [start, end) covering a calendar date
 */
export function dayRange(key: string): { start: Date; end: Date } {
  const start = new Date(`${key}T00:00:00.000Z`)
  return { start, end: new Date(start.getTime() + DAY_MS) }
}

export function addDays(key: string, days: number): string {
  return toDateKey(new Date(dayRange(key).start.getTime() + days * DAY_MS))
}

/**
 * Parse an "HH:MM" time of day into minutes after UTC midnight
 */
export function parseTimeOfDay(value: string): number | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim())
  if (!match) return null

  const hours = Number(match[1])
  const minutes = Number(match[2])
  if (hours > 23 || minutes > 59) return null

  return hours * 60 + minutes
}

/**
 * Most recent instant at `minuteOfDay` (UTC) that is not after `now`
 */
export function previousOccurrence(now: Date, minuteOfDay: number): Date {
  const midnight = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate())
  const candidate = midnight + minuteOfDay * 60 * 1000
  return new Date(candidate <= now.getTime() ? candidate : candidate - DAY_MS)
}

/**
 * First instant at `minuteOfDay` (UTC) strictly after `now`
 */
export function nextOccurrence(now: Date, minuteOfDay: number): Date {
  return new Date(previousOccurrence(now, minuteOfDay).getTime() + DAY_MS)
}
