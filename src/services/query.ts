import type { FastifyBaseLogger } from 'fastify'
import type {
  Coordinates,
  Customer,
  DailySpending,
  Draw,
  FraudCategory,
  HourlyCount,
  Page,
  Pagination,
  Receipt,
  Shop,
  UploadLocation,
} from '../types'
import { FRAUD_CATEGORIES } from '../types'
import type { FraudStats, ReceiptFilter, Store } from '../repositories/types'
import { FRAUD_SEVERITY, type FraudClassifier } from './fraud'
import { assertCoordinates } from './geo'
import {
  AppError,
  ErrorMessages,
  NotFoundError,
  ReviewConflictError,
} from '../utils/errors'
import { addDays, dayRange, isValidDateKey, toDateKey } from '../utils/dates'
import { normalizePhone, roundMoney, sanitizeString } from '../utils/validation'

export type ReviewAction = 'approve' | 'reject'

export interface FraudStatsReport {
  totalReceipts: number
  byCategory: Omit<FraudStats, 'total'>
  /** Share of receipts outside the valid band, in percent */
  fraudRate: number
}

export interface WinsReport {
  phone: string
  wins: Draw[]
  totalWon: number
}

export interface Overview {
  totalCustomers: number
  totalReceipts: number
  totalShops: number
  totalDraws: number
  totalSpent: number
  totalWinnings: number
}

/** Categories that show up on the review queue */
const REVIEW_QUEUE: FraudCategory[] = FRAUD_CATEGORIES.filter(
  (category) => FRAUD_SEVERITY[category] > FRAUD_SEVERITY.valid
)

/** Points returned per map layer */
const MAP_LIMIT = 1000

const MAX_SPENDING_DAYS = 365

/**
 * Read side of the platform plus the manual review action
 */
export class QueryService {
  private readonly now: () => Date

  constructor(
    private readonly store: Store,
    private readonly classifier: FraudClassifier,
    private readonly logger: FastifyBaseLogger,
    options: { now?: () => Date } = {}
  ) {
    this.now = options.now ?? (() => new Date())
  }

  // ============== Receipts ==============

  async listReceipts(filter: ReceiptFilter, page: Pagination): Promise<Page<Receipt>> {
    if (filter.date !== undefined && !isValidDateKey(filter.date)) {
      throw new AppError(400, ErrorMessages.INVALID_DATE, { date: filter.date })
    }
    return this.store.receipts.list(filter, page)
  }

  async getReceipt(id: string): Promise<Receipt> {
    const receipt = await this.store.receipts.findById(id)
    if (!receipt) throw new NotFoundError(ErrorMessages.RECEIPT_NOT_FOUND)
    return receipt
  }

  async receiptsByCustomer(phone: string, page: Pagination): Promise<Page<Receipt>> {
    return this.store.receipts.list({ customerPhone: this.phone(phone) }, page)
  }

  // ============== Customers ==============

  async listCustomers(page: Pagination): Promise<Page<Customer>> {
    return this.store.customers.listTopSpenders(page)
  }

  async getCustomer(phone: string): Promise<Customer> {
    const customer = await this.findCustomer(phone)
    if (!customer) throw new NotFoundError(ErrorMessages.CUSTOMER_NOT_FOUND)
    return customer
  }

  async findCustomer(phone: string): Promise<Customer | null> {
    return this.store.customers.findByPhone(this.phone(phone))
  }

  /**
   * Remember the customer's latest shared location, creating the customer
   * on first contact
   */
  async recordLocation(phone: string, location: Coordinates): Promise<Customer> {
    const normalized = this.phone(phone)
    assertCoordinates(location)

    const customer = await this.store.customers.updateLocation(normalized, location, this.now())
    this.logger.debug({ phone: normalized, location }, 'Customer location updated')
    return customer
  }

  // ============== Shops ==============

  async listShops(page: Pagination): Promise<Page<Shop>> {
    return this.store.shops.listPopular(page)
  }

  async getShop(id: string): Promise<Shop> {
    const shop = await this.store.shops.findById(id)
    if (!shop) throw new NotFoundError(ErrorMessages.SHOP_NOT_FOUND)
    return shop
  }

  // ============== Fraud ==============

  async fraudStats(): Promise<FraudStatsReport> {
    const { total, ...byCategory } = await this.store.receipts.fraudStats()
    const nonValid = total - byCategory.valid.count

    return {
      totalReceipts: total,
      byCategory,
      fraudRate: total > 0 ? roundMoney((nonValid / total) * 100) : 0,
    }
  }

  /**
   * Receipts outside the valid band that were not rejected, riskiest first
   */
  async reviewQueue(page: Pagination): Promise<Page<Receipt>> {
    return this.store.receipts.list(
      { fraudCategories: REVIEW_QUEUE, excludeStatuses: ['rejected'] },
      page,
      'fraudScore'
    )
  }

  thresholds() {
    return this.classifier.describeThresholds()
  }

  /**
   * Approve or reject a receipt once. Approval makes it a valid draw entry;
   * rejection removes it from the customer and shop aggregates.
   */
  async reviewReceipt(id: string, action: ReviewAction, reason?: string): Promise<Receipt> {
    const receipt = await this.getReceipt(id)

    if (receipt.status === 'won' || receipt.status === 'rejected') {
      throw new ReviewConflictError(ErrorMessages.RECEIPT_NOT_REVIEWABLE, { id, status: receipt.status })
    }
    if (receipt.reviewedAt) {
      throw new ReviewConflictError(ErrorMessages.RECEIPT_ALREADY_REVIEWED, { id, reviewedAt: receipt.reviewedAt })
    }

    const note = reason ? sanitizeString(reason, 300) : ''
    const reviewedAt = this.now()

    const updated = action === 'approve'
      ? await this.store.receipts.applyReview(id, ['processed', 'pending_review'], {
        status: 'processed',
        fraudCategory: 'valid',
        fraudReason: note ? `manually approved: ${note}` : 'manually approved',
        reviewedAt,
      })
      : await this.store.withTransaction(async (tx) => {
        const rejected = await tx.receipts.applyReview(id, ['processed', 'pending_review'], {
          status: 'rejected',
          fraudReason: note ? `manually rejected: ${note}` : 'manually rejected',
          reviewedAt,
        })
        if (!rejected) return null

        await tx.customers.revertReceipt(rejected.customerPhone, rejected.amount)
        if (rejected.shopId) {
          await tx.shops.revertReceipt(rejected.shopId, rejected.amount)
        }
        return rejected
      })

    // Lost a race with the draw or another reviewer
    if (!updated) {
      throw new ReviewConflictError(ErrorMessages.RECEIPT_NOT_REVIEWABLE, { id })
    }

    this.logger.info({ receiptId: id, action, previousCategory: receipt.fraudCategory }, 'Receipt reviewed')
    return updated
  }

  // ============== Draws ==============

  async listDraws(page: Pagination): Promise<Page<Draw>> {
    return this.store.draws.list(page)
  }

  async getDraw(date: string): Promise<Draw> {
    if (!isValidDateKey(date)) {
      throw new AppError(400, ErrorMessages.INVALID_DATE, { date })
    }
    const draw = await this.findDraw(date)
    if (!draw) throw new NotFoundError(ErrorMessages.DRAW_NOT_FOUND)
    return draw
  }

  async findDraw(date: string): Promise<Draw | null> {
    return this.store.draws.findByDate(date)
  }

  async winsByPhone(phone: string): Promise<WinsReport> {
    const normalized = this.phone(phone)
    const wins = await this.store.draws.listByWinner(normalized)
    return {
      phone: normalized,
      wins,
      totalWon: roundMoney(wins.reduce((sum, draw) => sum + draw.prizeAmount, 0)),
    }
  }

  // ============== Map ==============

  async mapShops(): Promise<Shop[]> {
    return this.store.shops.listWithCoordinates(MAP_LIMIT)
  }

  /**
   * Where receipts were uploaded from, newest first, optionally for one UTC date
   */
  async mapReceipts(date?: string): Promise<UploadLocation[]> {
    if (date !== undefined && !isValidDateKey(date)) {
      throw new AppError(400, ErrorMessages.INVALID_DATE, { date })
    }
    return this.store.receipts.listUploadLocations(date, MAP_LIMIT)
  }

  // ============== Analytics ==============

  /**
   * Non-rejected spend for each of the last `days` UTC dates, today included.
   * Dates without receipts are reported as zero.
   */
  async spendingByDay(days: number): Promise<DailySpending[]> {
    if (!Number.isInteger(days) || days < 1 || days > MAX_SPENDING_DAYS) {
      throw new AppError(400, ErrorMessages.INVALID_DAYS, { days })
    }

    const first = addDays(toDateKey(this.now()), -(days - 1))
    const rows = await this.store.receipts.spendingByDay(dayRange(first).start)
    const byDate = new Map(rows.map((row) => [row.date, row]))

    const series: DailySpending[] = []
    for (let offset = 0; offset < days; offset++) {
      const date = addDays(first, offset)
      const row = byDate.get(date)
      series.push({ date, amount: roundMoney(row?.amount ?? 0), receipts: row?.receipts ?? 0 })
    }
    return series
  }

  /** Receipt count per UTC hour of submission, all 24 hours */
  async receiptsByHour(): Promise<HourlyCount[]> {
    const rows = await this.store.receipts.countByHour()
    const counts = new Map(rows.map((row) => [row.hour, row.count]))
    return Array.from({ length: 24 }, (_, hour) => ({ hour, count: counts.get(hour) ?? 0 }))
  }

  async overview(): Promise<Overview> {
    const [totals, totalReceipts, totalShops, totalDraws] = await Promise.all([
      this.store.customers.totals(),
      this.store.receipts.count(),
      this.store.shops.count(),
      this.store.draws.countCompleted(),
    ])

    return {
      totalCustomers: totals.customers,
      totalReceipts,
      totalShops,
      totalDraws,
      totalSpent: roundMoney(totals.totalSpent),
      totalWinnings: roundMoney(totals.totalWinnings),
    }
  }

  private phone(input: string): string {
    const phone = normalizePhone(input)
    if (!phone) throw new AppError(400, ErrorMessages.INVALID_PHONE, { phone: input })
    return phone
  }
}
