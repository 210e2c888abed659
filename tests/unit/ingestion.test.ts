import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest'
import { ReceiptIngestionService } from '../../src/services/ingestion'
import type { ReverseGeocoder } from '../../src/services/geocoding'
import { FraudClassifier } from '../../src/services/fraud'
import { InvalidAmountError, MissingCustomerError } from '../../src/utils/errors'
import { MemoryStore } from '../utils/memory-store'
import { silentLogger } from '../utils/logger'
import { JOHANNESBURG, at, northOf, testClock } from '../utils/fixtures'

describe('ReceiptIngestionService', () => {
  let store: MemoryStore
  let service: ReceiptIngestionService

  beforeEach(() => {
    store = new MemoryStore()
    service = new ReceiptIngestionService(store, new FraudClassifier(), silentLogger, {
      now: testClock(at(10)).now,
    })
  })

  it('records a valid receipt with customer and shop aggregates', async () => {
    const { receipt, shop } = await service.ingest({
      customerPhone: '+27 82 123 4567',
      amount: 120.5,
      shopName: '  Corner  Grocer ',
      shopCoords: JOHANNESBURG,
      uploadCoords: northOf(JOHANNESBURG, 10),
    })

    expect(receipt).toMatchObject({
      customerPhone: '+27821234567',
      shopName: 'Corner Grocer',
      amount: 120.5,
      currency: 'ZAR',
      fraudCategory: 'valid',
      fraudScore: 4,
      distanceKm: 10,
      status: 'processed',
      reviewedAt: null,
    })
    expect(receipt.submittedAt).toEqual(at(10))
    expect(shop).toMatchObject({ name: 'Corner Grocer', normalizedName: 'corner grocer', coordinates: JOHANNESBURG })

    expect(await store.customers.findByPhone('+27821234567')).toMatchObject({ totalReceipts: 1, totalSpent: 120.5 })
    expect(await store.shops.findById(receipt.shopId ?? '')).toMatchObject({ receiptCount: 1, totalSales: 120.5 })
  })

  it('holds a flagged receipt for review', async () => {
    const { receipt } = await service.ingest({
      customerPhone: '0821234567',
      amount: 300,
      shopName: 'Far Away Mart',
      shopCoords: JOHANNESBURG,
      uploadCoords: northOf(JOHANNESBURG, 250),
    })

    expect(receipt).toMatchObject({ fraudCategory: 'flagged', fraudScore: 95, status: 'pending_review' })
  })

  it('keeps suspicious receipts processed but out of the valid band', async () => {
    const { receipt } = await service.ingest({
      customerPhone: '0821234567',
      amount: 40,
      shopCoords: JOHANNESBURG,
      uploadCoords: northOf(JOHANNESBURG, 150),
    })

    expect(receipt).toMatchObject({ fraudCategory: 'suspicious', status: 'processed', shopId: null })
  })

  it('sends receipts without location data to review', async () => {
    const { receipt } = await service.ingest({ customerPhone: '0821234567', amount: 55 })

    expect(receipt).toMatchObject({
      fraudCategory: 'review',
      fraudScore: 50,
      fraudReason: 'insufficient location data',
      distanceKm: null,
      status: 'processed',
    })
  })

  it('degrades invalid coordinates to review instead of failing', async () => {
    const { receipt, shop } = await service.ingest({
      customerPhone: '0821234567',
      amount: 55,
      shopName: 'Odd Shop',
      shopCoords: { latitude: 95, longitude: 0 },
      uploadCoords: JOHANNESBURG,
    })

    expect(receipt).toMatchObject({ fraudCategory: 'review', fraudScore: 50, fraudReason: 'invalid location data' })
    expect(shop?.coordinates).toBeNull()
    expect(await store.receipts.count()).toBe(1)
  })

  it('reuses a shop by normalized name and its stored coordinates', async () => {
    const first = await service.ingest({
      customerPhone: '0821234567',
      amount: 10,
      shopName: 'Corner Grocer',
      shopCoords: JOHANNESBURG,
    })
    const second = await service.ingest({
      customerPhone: '0831234567',
      amount: 20,
      shopName: 'CORNER   grocer',
      uploadCoords: northOf(JOHANNESBURG, 75),
    })

    expect(second.shop?.id).toBe(first.shop?.id)
    expect(second.receipt).toMatchObject({ shopName: 'Corner Grocer', fraudCategory: 'review', distanceKm: 75 })
    expect(await store.shops.count()).toBe(1)
    expect(await store.shops.findById(first.shop?.id ?? '')).toMatchObject({ receiptCount: 2, totalSales: 30 })
  })

  it('backfills coordinates for a shop created without them', async () => {
    await service.ingest({ customerPhone: '0821234567', amount: 10, shopName: 'Corner Grocer' })
    const { shop } = await service.ingest({
      customerPhone: '0821234567',
      amount: 10,
      shopName: 'Corner Grocer',
      shopCoords: JOHANNESBURG,
    })

    expect(shop?.coordinates).toEqual(JOHANNESBURG)
  })

  it('never overwrites coordinates a shop already has', async () => {
    const elsewhere = northOf(JOHANNESBURG, 30)
    await service.ingest({ customerPhone: '0821234567', amount: 10, shopName: 'Corner Grocer', shopCoords: JOHANNESBURG })
    const { shop } = await service.ingest({
      customerPhone: '0821234567',
      amount: 10,
      shopName: 'Corner Grocer',
      shopCoords: elsewhere,
    })

    expect(shop?.coordinates).toEqual(JOHANNESBURG)
  })

  it('creates one shop under concurrent submissions', async () => {
    const names = ['Corner Grocer', 'corner grocer', ' CORNER GROCER', 'Corner  Grocer', 'corner Grocer ']
    await Promise.all(names.map((shopName, i) => service.ingest({ customerPhone: `082123456${i}`, amount: 10, shopName })))

    const { items } = await store.shops.listPopular({ limit: 10, offset: 0 })
    expect(items).toHaveLength(1)
    expect(items[0]).toMatchObject({ receiptCount: 5, totalSales: 50 })
  })

  it('normalizes currency and rounds the amount to cents', async () => {
    const { receipt } = await service.ingest({ customerPhone: '0821234567', amount: 19.999, currency: 'usd' })

    expect(receipt.currency).toBe('USD')
    expect(receipt.amount).toBe(20)
  })

  it.each([[0], [-5], [Number.NaN], [Number.POSITIVE_INFINITY], [0.004]])(
    'rejects amount %d before writing anything',
    async (amount) => {
      await expect(service.ingest({ customerPhone: '0821234567', amount, shopName: 'Corner Grocer' }))
        .rejects.toBeInstanceOf(InvalidAmountError)

      expect(await store.receipts.count()).toBe(0)
      expect(await store.shops.count()).toBe(0)
      expect(await store.customers.findByPhone('0821234567')).toBeNull()
    }
  )

  it.each([[''], ['abc'], ['12']])('rejects phone %o', async (customerPhone) => {
    await expect(service.ingest({ customerPhone, amount: 10 })).rejects.toThrow(
      'Could not process receipt: missing or malformed phone number'
    )
    await expect(service.ingest({ customerPhone, amount: 10 })).rejects.toBeInstanceOf(MissingCustomerError)
  })

  it('rolls back every write when one fails', async () => {
    vi.spyOn(store.shops, 'recordReceipt').mockRejectedValueOnce(new Error('write failed'))

    await expect(service.ingest({
      customerPhone: '0821234567',
      amount: 10,
      shopName: 'Corner Grocer',
      shopCoords: JOHANNESBURG,
    })).rejects.toThrow('write failed')

    expect(await store.receipts.count()).toBe(0)
    expect(await store.customers.findByPhone('0821234567')).toBeNull()
    // The shop row outlives the rollback, but without the submission's coordinates
    const { items } = await store.shops.listPopular({ limit: 10, offset: 0 })
    expect(items).toHaveLength(1)
    expect(items[0]).toMatchObject({ name: 'Corner Grocer', receiptCount: 0, totalSales: 0, coordinates: null })
  })

  it('reuses the empty shop left by a rolled-back submission', async () => {
    vi.spyOn(store.receipts, 'create').mockRejectedValueOnce(new Error('write failed'))
    await expect(service.ingest({ customerPhone: '0821234567', amount: 10, shopName: 'Corner Grocer' }))
      .rejects.toThrow('write failed')

    const { shop } = await service.ingest({
      customerPhone: '0821234567',
      amount: 15,
      shopName: 'Corner Grocer',
      shopCoords: JOHANNESBURG,
    })

    expect(await store.shops.count()).toBe(1)
    expect(await store.shops.findById(shop?.id ?? '')).toMatchObject({
      receiptCount: 1,
      totalSales: 15,
      coordinates: JOHANNESBURG,
    })
  })

  describe('upload address', () => {
    let reverse: Mock<ReverseGeocoder['reverse']>

    beforeEach(() => {
      reverse = vi.fn<ReverseGeocoder['reverse']>().mockResolvedValue('12 Main Street, Johannesburg')
      service = new ReceiptIngestionService(store, new FraudClassifier(), silentLogger, {
        now: testClock(at(10)).now,
        reverseGeocoder: { reverse },
      })
    })

    it('stores the reverse-geocoded upload location', async () => {
      const { receipt } = await service.ingest({ customerPhone: '0821234567', amount: 10, uploadCoords: JOHANNESBURG })

      expect(reverse).toHaveBeenCalledWith(JOHANNESBURG)
      expect(receipt.uploadAddress).toBe('12 Main Street, Johannesburg')
      expect((await store.receipts.findById(receipt.id))?.uploadAddress).toBe('12 Main Street, Johannesburg')
    })

    it('records the receipt without an address when the lookup fails', async () => {
      reverse.mockRejectedValueOnce(new Error('Geocoder responded with 503'))

      const { receipt } = await service.ingest({ customerPhone: '0821234567', amount: 10, uploadCoords: JOHANNESBURG })

      expect(receipt).toMatchObject({ uploadAddress: null, uploadCoordinates: JOHANNESBURG })
      expect(await store.receipts.count()).toBe(1)
    })

    it('skips the lookup without usable upload coordinates', async () => {
      await service.ingest({ customerPhone: '0821234567', amount: 10 })
      await service.ingest({ customerPhone: '0821234567', amount: 10, uploadCoords: { latitude: 0, longitude: 200 } })

      expect(reverse).not.toHaveBeenCalled()
    })
  })
})
