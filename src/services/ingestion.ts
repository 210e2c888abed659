import type { FastifyBaseLogger } from 'fastify'
import type { Coordinates, FraudVerdict, Receipt, ReceiptItem, ReceiptStatus, Shop } from '../types'
import type { Store } from '../repositories/types'
import { FraudClassifier, FRAUD_REASONS } from './fraud'
import type { ReverseGeocoder } from './geocoding'
import { isValidCoordinates } from './geo'
import { InvalidAmountError, InvalidCoordinateError, MissingCustomerError } from '../utils/errors'
import { cleanShopName, normalizePhone, normalizeShopName, roundMoney, sanitizeString } from '../utils/validation'

export interface ReceiptSubmission {
  customerPhone: string
  amount: number
  currency?: string
  shopName?: string | null
  shopAddress?: string | null
  receiptText?: string | null
  items?: ReceiptItem[]
  shopCoords?: Coordinates | null
  uploadCoords?: Coordinates | null
}

export interface IngestionResult {
  receipt: Receipt
  shop: Shop | null
}

export interface IngestionOptions {
  defaultCurrency?: string
  now?: () => Date
  /** Resolves upload coordinates to an address; lookups are best effort */
  reverseGeocoder?: ReverseGeocoder
}

const MAX_RECEIPT_TEXT = 10_000

/**
 * Receipt ingestion pipeline
 *
 * Validates a submission, resolves the shop, scores location fraud and
 * records the receipt together with the customer and shop aggregates.
 */
export class ReceiptIngestionService {
  private readonly defaultCurrency: string
  private readonly now: () => Date
  private readonly reverseGeocoder: ReverseGeocoder | null

  constructor(
    private readonly store: Store,
    private readonly classifier: FraudClassifier,
    private readonly logger: FastifyBaseLogger,
    options: IngestionOptions = {}
  ) {
    this.defaultCurrency = options.defaultCurrency ?? 'ZAR'
    this.now = options.now ?? (() => new Date())
    this.reverseGeocoder = options.reverseGeocoder ?? null
  }

  async ingest(submission: ReceiptSubmission): Promise<IngestionResult> {
    // Everything is validated before the first write
    const phone = normalizePhone(submission.customerPhone)
    if (!phone) {
      throw new MissingCustomerError({ customerPhone: submission.customerPhone })
    }

    const raw = submission.amount
    if (typeof raw !== 'number' || !Number.isFinite(raw) || roundMoney(raw) <= 0) {
      throw new InvalidAmountError({ amount: raw })
    }
    const amount = roundMoney(raw)

    const currency = (submission.currency?.trim() || this.defaultCurrency).toUpperCase()
    const shopName = submission.shopName ? cleanShopName(sanitizeString(submission.shopName, 200)) : ''
    const address = submission.shopAddress ? sanitizeString(submission.shopAddress, 300) : null

    const shop = shopName ? await this.resolveShop(shopName, address) : null
    const explicitShopCoords = submission.shopCoords ?? null
    const shopCoordinates = explicitShopCoords ?? shop?.coordinates ?? null
    const uploadCoordinates = submission.uploadCoords ?? null

    const verdict = this.score(shopCoordinates, uploadCoordinates)
    const status: ReceiptStatus = verdict.category === 'flagged' ? 'pending_review' : 'processed'
    const uploadAddress = await this.lookupAddress(uploadCoordinates)

    const recorded = await this.store.withTransaction<IngestionResult>(async (tx) => {
      const created = await tx.receipts.create({
        customerPhone: phone,
        shopId: shop?.id ?? null,
        shopName: shop?.name ?? null,
        amount,
        currency,
        items: submission.items ?? [],
        receiptText: submission.receiptText ? submission.receiptText.slice(0, MAX_RECEIPT_TEXT) : null,
        shopCoordinates,
        uploadCoordinates,
        uploadAddress,
        verdict,
        status,
        submittedAt: this.now(),
      })

      await tx.customers.recordReceipt(phone, created.amount)
      if (!shop) return { receipt: created, shop: null }

      let current = shop
      // Explicit coordinates fill in a shop that has none yet
      if (!shop.coordinates && explicitShopCoords && isValidCoordinates(explicitShopCoords)) {
        current = (await tx.shops.setCoordinatesIfMissing(shop.id, explicitShopCoords)) ?? shop
      }
      await tx.shops.recordReceipt(shop.id, created.amount)
      return { receipt: created, shop: current }
    })
    const { receipt } = recorded

    this.logger.info({
      receiptId: receipt.id,
      customerPhone: phone,
      shopId: receipt.shopId,
      amount: receipt.amount,
      fraudCategory: verdict.category,
      distanceKm: verdict.distanceKm,
      status,
    }, 'Receipt ingested')

    return recorded
  }

  /**
   * Find or create the shop by normalized name. Runs outside the receipt
   * transaction, so a rolled-back submission can leave an empty shop behind;
   * it carries no coordinates and no counts, and the next receipt under the
   * same name reuses it.
   */
  private async resolveShop(name: string, address: string | null): Promise<Shop> {
    return this.store.shops.findOrCreate({
      name,
      normalizedName: normalizeShopName(name),
      address,
      coordinates: null,
    })
  }

  private async lookupAddress(coordinates: Coordinates | null): Promise<string | null> {
    if (!this.reverseGeocoder || !coordinates || !isValidCoordinates(coordinates)) return null

    try {
      return await this.reverseGeocoder.reverse(coordinates)
    } catch (error) {
      this.logger.warn({ err: error, coordinates }, 'Reverse geocoding failed, address left empty')
      return null
    }
  }

  /**
   * A receipt is always recorded: bad coordinates degrade to review
   */
  private score(shop: Coordinates | null, upload: Coordinates | null): FraudVerdict {
    try {
      return this.classifier.classify(shop, upload)
    } catch (error) {
      if (!(error instanceof InvalidCoordinateError)) throw error

      this.logger.warn({ shop, upload, details: error.details }, 'Invalid coordinates, receipt sent to review')
      return this.classifier.withoutDistance(FRAUD_REASONS.invalid)
    }
  }
}
