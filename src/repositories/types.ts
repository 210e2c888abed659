import type {
  Coordinates,
  Customer,
  DailySpending,
  Draw,
  FraudCategory,
  FraudVerdict,
  HourlyCount,
  Page,
  Pagination,
  Receipt,
  ReceiptItem,
  ReceiptStatus,
  Shop,
  UploadLocation,
} from '../types'

export interface NewReceipt {
  customerPhone: string
  shopId: string | null
  shopName: string | null
  amount: number
  currency: string
  items: ReceiptItem[]
  receiptText: string | null
  shopCoordinates: Coordinates | null
  uploadCoordinates: Coordinates | null
  uploadAddress: string | null
  verdict: FraudVerdict
  status: ReceiptStatus
  submittedAt: Date
}

export interface ReceiptFilter {
  customerPhone?: string
  /** UTC calendar date, YYYY-MM-DD */
  date?: string
  status?: ReceiptStatus
  fraudCategories?: FraudCategory[]
  excludeStatuses?: ReceiptStatus[]
}

export type ReceiptSort = 'newest' | 'fraudScore'

export interface ReviewUpdate {
  status: ReceiptStatus
  fraudCategory?: FraudCategory
  fraudReason: string
  reviewedAt: Date
}

export interface FraudCategoryStats {
  count: number
  avgDistanceKm: number | null
  maxDistanceKm: number | null
}

export type FraudStats = Record<FraudCategory, FraudCategoryStats> & { total: number }

export interface DrawOutcome {
  totalReceipts: number
  totalAmount: number
  winnerReceiptId: string
  winnerPhone: string
  prizeAmount: number
  completedAt: Date
}

export interface CustomerRepository {
  findByPhone(phone: string): Promise<Customer | null>
  /** Upsert the customer and $inc its receipt count and spend */
  recordReceipt(phone: string, amount: number): Promise<void>
  /** $inc the receipt count and spend down after a rejection */
  revertReceipt(phone: string, amount: number): Promise<void>
  recordWin(phone: string, prizeAmount: number): Promise<void>
  /** Upsert the customer with its latest shared location */
  updateLocation(phone: string, location: Coordinates, at: Date): Promise<Customer>
  listTopSpenders(page: Pagination): Promise<Page<Customer>>
  totals(): Promise<{ customers: number; totalSpent: number; totalWinnings: number }>
}

export interface NewShop {
  name: string
  normalizedName: string
  address: string | null
  coordinates: Coordinates | null
}

export interface ShopRepository {
  findById(id: string): Promise<Shop | null>
  /** Atomic find-or-create keyed on normalizedName */
  findOrCreate(shop: NewShop): Promise<Shop>
  /** Set coordinates only while they are still null; returns the stored shop */
  setCoordinatesIfMissing(id: string, coordinates: Coordinates): Promise<Shop | null>
  recordReceipt(id: string, amount: number): Promise<void>
  revertReceipt(id: string, amount: number): Promise<void>
  /** Shops still lacking coordinates, fewest geocoding attempts first */
  listMissingCoordinates(limit: number, maxAttempts: number): Promise<Shop[]>
  recordGeocodeAttempt(id: string): Promise<void>
  listPopular(page: Pagination): Promise<Page<Shop>>
  listWithCoordinates(limit: number): Promise<Shop[]>
  count(): Promise<number>
}

export interface ReceiptRepository {
  create(receipt: NewReceipt): Promise<Receipt>
  findById(id: string): Promise<Receipt | null>
  list(filter: ReceiptFilter, page: Pagination, sort?: ReceiptSort): Promise<Page<Receipt>>
  /** Receipts submitted on the date, with the given status and categories */
  findEligible(date: string, status: ReceiptStatus, categories: FraudCategory[]): Promise<Receipt[]>
  /** processed -> won; false when the receipt is no longer processed */
  markWon(id: string): Promise<boolean>
  /** Apply a review while the receipt is still in one of `fromStatuses` and unreviewed */
  applyReview(id: string, fromStatuses: ReceiptStatus[], update: ReviewUpdate): Promise<Receipt | null>
  fraudStats(): Promise<FraudStats>
  /** Newest receipts with an upload location, optionally on one UTC date */
  listUploadLocations(date: string | undefined, limit: number): Promise<UploadLocation[]>
  /** Non-rejected spend per UTC date from `since` on; dates without receipts are absent */
  spendingByDay(since: Date): Promise<DailySpending[]>
  /** Receipts per UTC hour of submission; hours without receipts are absent */
  countByHour(): Promise<HourlyCount[]>
  count(): Promise<number>
}

export interface DrawRepository {
  findByDate(drawDate: string): Promise<Draw | null>
  /**
   * Atomically claim the date: insert a pending draw, or take over a
   * no_entries draw or a pending claim made before `staleBefore`.
   * Returns null when another run holds or finished the date.
   */
  claim(drawDate: string, claimId: string, now: Date, staleBefore: Date): Promise<Draw | null>
  /** Finish a claimed draw with an empty pool */
  markNoEntries(drawDate: string, claimId: string): Promise<Draw | null>
  /** Complete a claimed draw; null when the claim was lost */
  complete(drawDate: string, claimId: string, outcome: DrawOutcome): Promise<Draw | null>
  setWinnerNotified(drawDate: string, notified: boolean): Promise<void>
  list(page: Pagination): Promise<Page<Draw>>
  listByWinner(phone: string): Promise<Draw[]>
  countCompleted(): Promise<number>
}

/**
 * Persistence boundary of the core. `withTransaction` runs `work` against a
 * store whose writes commit together or not at all.
 */
export interface Store {
  customers: CustomerRepository
  shops: ShopRepository
  receipts: ReceiptRepository
  draws: DrawRepository
  withTransaction<T>(work: (tx: Store) => Promise<T>): Promise<T>
}
