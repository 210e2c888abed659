export interface Coordinates {
  latitude: number
  longitude: number
}

export const FRAUD_CATEGORIES = ['valid', 'review', 'suspicious', 'flagged'] as const

export type FraudCategory = (typeof FRAUD_CATEGORIES)[number]

export const RECEIPT_STATUSES = ['processed', 'pending_review', 'won', 'rejected'] as const

export type ReceiptStatus = (typeof RECEIPT_STATUSES)[number]

export type DrawStatus = 'pending' | 'completed' | 'no_entries'

export interface ReceiptItem {
  name: string
  price: number
}

export interface Customer {
  phone: string
  totalReceipts: number
  totalSpent: number
  totalWins: number
  totalWinnings: number
  lastLocation: Coordinates | null
  lastLocationAt: Date | null
  createdAt: Date
}

export interface Shop {
  id: string
  name: string
  normalizedName: string
  address: string | null
  coordinates: Coordinates | null
  receiptCount: number
  totalSales: number
  createdAt: Date
}

export interface Receipt {
  id: string
  customerPhone: string
  shopId: string | null
  shopName: string | null
  amount: number
  currency: string
  items: ReceiptItem[]
  receiptText: string | null
  shopCoordinates: Coordinates | null
  uploadCoordinates: Coordinates | null
  /** Reverse-geocoded upload location, when a geocoder is configured */
  uploadAddress: string | null
  distanceKm: number | null
  fraudCategory: FraudCategory
  fraudScore: number
  fraudReason: string
  status: ReceiptStatus
  submittedAt: Date
  reviewedAt: Date | null
}

export interface Draw {
  id: string
  drawDate: string
  status: DrawStatus
  totalReceipts: number
  totalAmount: number
  winnerReceiptId: string | null
  winnerPhone: string | null
  prizeAmount: number
  claimId: string | null
  claimedAt: Date | null
  completedAt: Date | null
  winnerNotified: boolean
}

export interface FraudVerdict {
  category: FraudCategory
  score: number
  reason: string
  distanceKm: number | null
}

/** Upload location of one receipt, for the map view */
export interface UploadLocation {
  id: string
  customerPhone: string
  shopName: string | null
  amount: number
  fraudCategory: FraudCategory
  uploadCoordinates: Coordinates
  uploadAddress: string | null
  submittedAt: Date
}

export interface DailySpending {
  /** UTC calendar date, YYYY-MM-DD */
  date: string
  amount: number
  receipts: number
}

export interface HourlyCount {
  /** UTC hour, 0-23 */
  hour: number
  count: number
}

export interface Page<T> {
  items: T[]
  total: number
}

export interface Pagination {
  limit: number
  offset: number
}
