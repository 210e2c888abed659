import type { FastifyBaseLogger } from 'fastify'
import type { DrawStatus } from '../types'
import type { DrawRunResult, DrawService } from './draw'
import type { ShopGeocodingService } from './geocoding'
import { addDays, nextOccurrence, previousOccurrence, toDateKey } from '../utils/dates'

export interface SchedulerOptions {
  /** Daily draw instant, minutes after UTC midnight */
  timeOfDay: number
  /** Earlier dates re-checked on every tick for a missing draw */
  catchUpDays: number
  /** 0 disables the geocoding backfill */
  geocodeIntervalMinutes?: number
  now?: () => Date
}

export interface ScheduledRun {
  drawDate: string
  status: DrawStatus | 'failed'
  winnerPhone: string | null
  error?: string
}

export interface SchedulerStatus {
  running: boolean
  drawTimeUtc: string
  lastRunAt: Date | null
  nextRunAt: Date | null
  lastResults: ScheduledRun[]
}

function formatTimeOfDay(minutes: number): string {
  const hh = String(Math.floor(minutes / 60)).padStart(2, '0')
  const mm = String(minutes % 60).padStart(2, '0')
  return `${hh}:${mm}`
}

/**
 * Background scheduler for the daily draw
 *
 * Fires once a day at the configured UTC instant. Every tick draws each date
 * in the catch-up window that has no completed draw, so a day missed while
 * the process was down is drawn on the next tick (or at start). A no_entries
 * date is drawn again, which picks up receipts submitted after an early
 * manual trigger.
 */
export class SchedulerService {
  private drawTimer: NodeJS.Timeout | null = null
  private geocodeTimer: NodeJS.Timeout | null = null
  private lastRunAt: Date | null = null
  private nextRunAt: Date | null = null
  private lastResults: ScheduledRun[] = []
  private readonly now: () => Date

  constructor(
    private readonly draws: DrawService,
    private readonly logger: FastifyBaseLogger,
    private readonly options: SchedulerOptions,
    private readonly geocoding?: ShopGeocodingService
  ) {
    this.now = options.now ?? (() => new Date())
  }

  get running(): boolean {
    return this.drawTimer !== null
  }

  /**
   * Arm the daily timer and catch up on missed draws
   */
  async start(): Promise<void> {
    if (this.running) {
      this.logger.info('Scheduler already running')
      return
    }

    this.arm()

    const intervalMinutes = this.options.geocodeIntervalMinutes ?? 0
    if (this.geocoding && intervalMinutes > 0) {
      this.geocodeTimer = setInterval(() => {
        void this.runGeocoding()
      }, intervalMinutes * 60 * 1000)
    }

    this.logger.info({
      drawTimeUtc: formatTimeOfDay(this.options.timeOfDay),
      nextRunAt: this.nextRunAt?.toISOString(),
    }, 'Scheduler started')

    await this.tick()
  }

  stop(): void {
    if (this.drawTimer) {
      clearTimeout(this.drawTimer)
      this.drawTimer = null
    }
    if (this.geocodeTimer) {
      clearInterval(this.geocodeTimer)
      this.geocodeTimer = null
    }
    this.nextRunAt = null
    this.logger.info('Scheduler stopped')
  }

  status(): SchedulerStatus {
    return {
      running: this.running,
      drawTimeUtc: formatTimeOfDay(this.options.timeOfDay),
      lastRunAt: this.lastRunAt,
      nextRunAt: this.nextRunAt,
      lastResults: this.lastResults,
    }
  }

  /**
   * Manually run the draw for a date (testing, backfill)
   */
  async trigger(date?: string): Promise<DrawRunResult> {
    const result = await this.draws.runDraw(date)
    this.lastRunAt = this.now()
    this.lastResults = [this.summarize(result)]
    this.logger.info({ drawDate: result.draw.drawDate, status: result.draw.status }, 'Manual draw triggered')
    return result
  }

  /**
   * Dates whose draw is due at `now`: the date closed by the most recent
   * scheduled instant, preceded by the catch-up window (oldest first)
   */
  dueDates(now: Date = this.now()): string[] {
    const lastInstant = previousOccurrence(now, this.options.timeOfDay)
    const target = toDateKey(new Date(lastInstant.getTime() - 1))

    const dates: string[] = []
    for (let offset = this.options.catchUpDays; offset >= 0; offset--) {
      dates.push(addDays(target, -offset))
    }
    return dates
  }

  /**
   * Draw every due date that has no completed draw yet
   */
  async tick(): Promise<ScheduledRun[]> {
    const now = this.now()
    const results: ScheduledRun[] = []

    for (const drawDate of this.dueDates(now)) {
      try {
        const existing = await this.draws.findDraw(drawDate)
        if (existing?.status === 'completed') continue

        if (!existing) {
          this.logger.info({ drawDate }, 'Running scheduled draw')
        }
        const result = await this.draws.runDraw(drawDate)
        results.push(this.summarize(result))
      } catch (error) {
        this.logger.error({ err: error, drawDate }, 'Scheduled draw failed')
        results.push({
          drawDate,
          status: 'failed',
          winnerPhone: null,
          error: error instanceof Error ? error.message : String(error),
        })
      }
    }

    this.lastRunAt = now
    this.lastResults = results
    return results
  }

  private arm(): void {
    const next = nextOccurrence(this.now(), this.options.timeOfDay)
    this.nextRunAt = next

    this.drawTimer = setTimeout(() => {
      this.arm()
      void this.tick()
    }, next.getTime() - this.now().getTime())
  }

  private async runGeocoding(): Promise<void> {
    if (!this.geocoding) return

    try {
      await this.geocoding.backfill()
    } catch (error) {
      this.logger.error({ err: error }, 'Shop geocoding backfill failed')
    }
  }

  private summarize(result: DrawRunResult): ScheduledRun {
    return {
      drawDate: result.draw.drawDate,
      status: result.draw.status,
      winnerPhone: result.draw.winnerPhone,
    }
  }
}
