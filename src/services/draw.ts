import { randomInt, randomUUID } from 'crypto'
import type { FastifyBaseLogger } from 'fastify'
import type { Draw, FraudCategory, Receipt } from '../types'
import type { Store } from '../repositories/types'
import type { WinnerNotifier } from './notifier'
import { AppError, DuplicateDrawError, ErrorMessages } from '../utils/errors'
import { isValidDateKey, toDateKey } from '../utils/dates'
import { roundMoney } from '../utils/validation'

/** Categories that may enter the pool; suspicious and flagged never do */
export const ELIGIBLE_CATEGORIES: FraudCategory[] = ['valid', 'review']

export interface DrawRunResult {
  /** As stored when the run returned; winnerNotified is set later, once the notifier answers */
  draw: Draw
  winner: Receipt | null
  /** True when the date had already been drawn and nothing was re-run */
  alreadyCompleted: boolean
}

export interface DrawOptions {
  /** A pending claim older than this may be taken over */
  claimTimeoutMs?: number
  now?: () => Date
  /** Uniform integer in [0, size) */
  randomIndex?: (size: number) => number
}

/**
 * Daily prize draw
 *
 * One receipt from the day's eligible pool wins back its own amount.
 * The date is claimed atomically before the pool is read, so concurrent runs
 * (scheduler and manual trigger) never complete the same date twice.
 * The winner is picked with crypto.randomInt, which cannot be predicted
 * from outside the process. The winner is notified in the background after
 * the outcome commits.
 */
export class DrawService {
  private readonly claimTimeoutMs: number
  private readonly now: () => Date
  private readonly randomIndex: (size: number) => number
  private readonly inFlight = new Map<string, Promise<DrawRunResult>>()
  private readonly notifications = new Set<Promise<void>>()

  constructor(
    private readonly store: Store,
    private readonly notifier: WinnerNotifier,
    private readonly logger: FastifyBaseLogger,
    options: DrawOptions = {}
  ) {
    this.claimTimeoutMs = options.claimTimeoutMs ?? 10 * 60 * 1000
    this.now = options.now ?? (() => new Date())
    this.randomIndex = options.randomIndex ?? ((size) => randomInt(size))
  }

  /**
   * Run the draw for a UTC date (default: today). A completed date is
   * returned unchanged; a no_entries date is drawn again.
   */
  async runDraw(date?: string): Promise<DrawRunResult> {
    const drawDate = date ?? toDateKey(this.now())
    if (!isValidDateKey(drawDate)) {
      throw new AppError(400, ErrorMessages.INVALID_DATE, { date: drawDate })
    }

    const pending = this.inFlight.get(drawDate)
    if (pending) return pending

    const run = this.execute(drawDate).finally(() => this.inFlight.delete(drawDate))
    this.inFlight.set(drawDate, run)
    return run
  }

  async findDraw(drawDate: string): Promise<Draw | null> {
    return this.store.draws.findByDate(drawDate)
  }

  /**
   * Resolves once every winner notification started so far has finished
   */
  async settled(): Promise<void> {
    await Promise.all(this.notifications)
  }

  private async execute(drawDate: string): Promise<DrawRunResult> {
    const existing = await this.store.draws.findByDate(drawDate)
    if (existing?.status === 'completed') {
      this.logger.info({ drawDate, winnerPhone: existing.winnerPhone }, 'Draw already completed')
      return this.storedResult(existing)
    }

    const now = this.now()
    const claimId = randomUUID()
    const claimed = await this.store.draws.claim(drawDate, claimId, now, new Date(now.getTime() - this.claimTimeoutMs))
    if (!claimed) {
      this.logger.info({ drawDate }, 'Draw date is held by another run')
      return this.currentResult(drawDate)
    }

    try {
      return await this.drawClaimed(drawDate, claimId)
    } catch (error) {
      if (error instanceof DuplicateDrawError) {
        this.logger.warn({ drawDate, claimId }, 'Draw claim lost before completion')
        return this.currentResult(drawDate)
      }
      throw error
    }
  }

  private async drawClaimed(drawDate: string, claimId: string): Promise<DrawRunResult> {
    let pool = await this.store.receipts.findEligible(drawDate, 'processed', ELIGIBLE_CATEGORIES)

    while (pool.length > 0) {
      const candidate = pool[this.randomIndex(pool.length)]
      const totalReceipts = pool.length
      const totalAmount = roundMoney(pool.reduce((sum, receipt) => sum + receipt.amount, 0))

      const draw = await this.store.withTransaction(async (tx) => {
        // processed -> won is conditional, so a receipt can never win twice
        const won = await tx.receipts.markWon(candidate.id)
        if (!won) return null

        const completed = await tx.draws.complete(drawDate, claimId, {
          totalReceipts,
          totalAmount,
          winnerReceiptId: candidate.id,
          winnerPhone: candidate.customerPhone,
          prizeAmount: candidate.amount,
          completedAt: this.now(),
        })
        if (!completed) {
          throw new DuplicateDrawError(drawDate)
        }

        await tx.customers.recordWin(candidate.customerPhone, candidate.amount)
        return completed
      })

      if (!draw) {
        this.logger.warn({ drawDate, receiptId: candidate.id }, 'Receipt left the pool during the draw, picking again')
        pool = pool.filter((receipt) => receipt.id !== candidate.id)
        continue
      }

      this.logger.info({
        drawDate,
        winnerPhone: draw.winnerPhone,
        prizeAmount: draw.prizeAmount,
        totalReceipts,
        totalAmount,
      }, 'Draw completed')

      this.notifyWinner(draw)
      return {
        draw,
        winner: { ...candidate, status: 'won' },
        alreadyCompleted: false,
      }
    }

    const empty = await this.store.draws.markNoEntries(drawDate, claimId)
    if (!empty) {
      throw new DuplicateDrawError(drawDate)
    }

    this.logger.info({ drawDate }, 'No eligible receipts, draw closed without a winner')
    return { draw: empty, winner: null, alreadyCompleted: false }
  }

  /**
   * Notification never affects the stored draw outcome and never delays the run
   */
  private notifyWinner(draw: Draw): void {
    const { drawDate, winnerPhone, prizeAmount } = draw
    if (!winnerPhone) return

    const notification: Promise<void> = this.notifier.notifyWinner(winnerPhone, prizeAmount, drawDate)
      .then(async (notified) => {
        await this.store.draws.setWinnerNotified(drawDate, notified)
        if (!notified) {
          this.logger.warn({ drawDate, winnerPhone }, 'Winner notification was not delivered')
        }
      })
      .catch((error: unknown) => {
        this.logger.error({ err: error, drawDate, winnerPhone }, 'Failed to notify winner')
      })
      .finally(() => this.notifications.delete(notification))
    this.notifications.add(notification)
  }

  private async currentResult(drawDate: string): Promise<DrawRunResult> {
    const current = await this.store.draws.findByDate(drawDate)
    if (!current) {
      throw new Error(`Draw for ${drawDate} disappeared while being claimed`)
    }
    return this.storedResult(current)
  }

  private async storedResult(draw: Draw): Promise<DrawRunResult> {
    const winner = draw.winnerReceiptId ? await this.store.receipts.findById(draw.winnerReceiptId) : null
    return { draw, winner, alreadyCompleted: draw.status === 'completed' }
  }
}
