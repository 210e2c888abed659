import mongoose, { Types, type ClientSession, type Connection, type FilterQuery, type SortOrder } from 'mongoose'
import {
  Customer as CustomerModel,
  Draw as DrawModel,
  Receipt as ReceiptModel,
  Shop as ShopModel,
  type ICustomer,
  type IDraw,
  type IReceipt,
  type IShop,
} from '../models'
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
  ReceiptStatus,
  Shop,
  UploadLocation,
} from '../types'
import { FRAUD_CATEGORIES } from '../types'
import { dayRange } from '../utils/dates'
import type {
  CustomerRepository,
  DrawOutcome,
  DrawRepository,
  FraudStats,
  NewReceipt,
  NewShop,
  ReceiptFilter,
  ReceiptRepository,
  ReceiptSort,
  ReviewUpdate,
  ShopRepository,
  Store,
} from './types'

function toCoordinates(latitude?: number | null, longitude?: number | null): Coordinates | null {
  return typeof latitude === 'number' && typeof longitude === 'number' ? { latitude, longitude } : null
}

function isDuplicateKey(error: unknown): boolean {
  return error instanceof mongoose.mongo.MongoServerError && error.code === 11000
}

function toCustomer(doc: ICustomer): Customer {
  return {
    phone: doc.phone,
    totalReceipts: doc.totalReceipts,
    totalSpent: doc.totalSpent,
    totalWins: doc.totalWins,
    totalWinnings: doc.totalWinnings,
    lastLocation: toCoordinates(doc.lastLatitude, doc.lastLongitude),
    lastLocationAt: doc.lastLocationAt ?? null,
    createdAt: doc.createdAt,
  }
}

function toShop(doc: IShop): Shop {
  return {
    id: doc._id.toString(),
    name: doc.name,
    normalizedName: doc.normalizedName,
    address: doc.address ?? null,
    coordinates: toCoordinates(doc.latitude, doc.longitude),
    receiptCount: doc.receiptCount,
    totalSales: doc.totalSales,
    createdAt: doc.createdAt,
  }
}

function toReceipt(doc: IReceipt): Receipt {
  return {
    id: doc._id.toString(),
    customerPhone: doc.customerPhone,
    shopId: doc.shopId ? doc.shopId.toString() : null,
    shopName: doc.shopName ?? null,
    amount: doc.amount,
    currency: doc.currency,
    items: doc.items.map((item) => ({ name: item.name, price: item.price })),
    receiptText: doc.receiptText ?? null,
    shopCoordinates: toCoordinates(doc.shopLatitude, doc.shopLongitude),
    uploadCoordinates: toCoordinates(doc.uploadLatitude, doc.uploadLongitude),
    uploadAddress: doc.uploadAddress ?? null,
    distanceKm: doc.distanceKm ?? null,
    fraudCategory: doc.fraudCategory,
    fraudScore: doc.fraudScore,
    fraudReason: doc.fraudReason,
    status: doc.status,
    submittedAt: doc.submittedAt,
    reviewedAt: doc.reviewedAt ?? null,
  }
}

function toDraw(doc: IDraw): Draw {
  return {
    id: doc._id.toString(),
    drawDate: doc.drawDate,
    status: doc.status,
    totalReceipts: doc.totalReceipts,
    totalAmount: doc.totalAmount,
    winnerReceiptId: doc.winnerReceiptId ? doc.winnerReceiptId.toString() : null,
    winnerPhone: doc.winnerPhone ?? null,
    prizeAmount: doc.prizeAmount,
    claimId: doc.claimId ?? null,
    claimedAt: doc.claimedAt ?? null,
    completedAt: doc.completedAt ?? null,
    winnerNotified: doc.winnerNotified,
  }
}

class MongoCustomerRepository implements CustomerRepository {
  constructor(private readonly session?: ClientSession) {}

  async findByPhone(phone: string): Promise<Customer | null> {
    const doc = await CustomerModel.findOne({ phone }).session(this.session ?? null)
    return doc ? toCustomer(doc) : null
  }

  async recordReceipt(phone: string, amount: number): Promise<void> {
    await CustomerModel.updateOne(
      { phone },
      { $inc: { totalReceipts: 1, totalSpent: amount } },
      { upsert: true, session: this.session }
    )
  }

  async revertReceipt(phone: string, amount: number): Promise<void> {
    await CustomerModel.updateOne(
      { phone },
      { $inc: { totalReceipts: -1, totalSpent: -amount } },
      { session: this.session }
    )
  }

  async recordWin(phone: string, prizeAmount: number): Promise<void> {
    await CustomerModel.updateOne(
      { phone },
      { $inc: { totalWins: 1, totalWinnings: prizeAmount } },
      { upsert: true, session: this.session }
    )
  }

  async updateLocation(phone: string, location: Coordinates, at: Date): Promise<Customer> {
    const doc = await CustomerModel.findOneAndUpdate(
      { phone },
      { $set: { lastLatitude: location.latitude, lastLongitude: location.longitude, lastLocationAt: at } },
      { upsert: true, new: true, session: this.session }
    )
    if (!doc) {
      throw new Error(`Customer upsert returned no document for ${phone}`)
    }
    return toCustomer(doc)
  }

  async listTopSpenders(page: Pagination): Promise<Page<Customer>> {
    const [docs, total] = await Promise.all([
      CustomerModel.find().sort({ totalSpent: -1 }).skip(page.offset).limit(page.limit).session(this.session ?? null),
      CustomerModel.countDocuments().session(this.session ?? null),
    ])
    return { items: docs.map(toCustomer), total }
  }

  async totals(): Promise<{ customers: number; totalSpent: number; totalWinnings: number }> {
    const [row] = await CustomerModel.aggregate<{ customers: number; totalSpent: number; totalWinnings: number }>([
      {
        $group: {
          _id: null,
          customers: { $sum: 1 },
          totalSpent: { $sum: '$totalSpent' },
          totalWinnings: { $sum: '$totalWinnings' },
        },
      },
    ]).session(this.session ?? null)

    return {
      customers: row?.customers ?? 0,
      totalSpent: row?.totalSpent ?? 0,
      totalWinnings: row?.totalWinnings ?? 0,
    }
  }
}

class MongoShopRepository implements ShopRepository {
  constructor(private readonly session?: ClientSession) {}

  async findById(id: string): Promise<Shop | null> {
    if (!Types.ObjectId.isValid(id)) return null
    const doc = await ShopModel.findById(id).session(this.session ?? null)
    return doc ? toShop(doc) : null
  }

  async findOrCreate(shop: NewShop): Promise<Shop> {
    try {
      const doc = await ShopModel.findOneAndUpdate(
        { normalizedName: shop.normalizedName },
        {
          $setOnInsert: {
            name: shop.name,
            address: shop.address,
            latitude: shop.coordinates?.latitude ?? null,
            longitude: shop.coordinates?.longitude ?? null,
          },
        },
        { upsert: true, new: true, session: this.session }
      )
      if (doc) return toShop(doc)
    } catch (error) {
      // A concurrent upsert inserted the same name first
      if (!isDuplicateKey(error)) throw error
    }

    const existing = await ShopModel.findOne({ normalizedName: shop.normalizedName }).session(this.session ?? null)
    if (!existing) {
      throw new Error(`Shop '${shop.normalizedName}' could not be created`)
    }
    return toShop(existing)
  }

  async setCoordinatesIfMissing(id: string, coordinates: Coordinates): Promise<Shop | null> {
    const updated = await ShopModel.findOneAndUpdate(
      { _id: id, latitude: null },
      { $set: { latitude: coordinates.latitude, longitude: coordinates.longitude } },
      { new: true, session: this.session }
    )
    if (updated) return toShop(updated)
    return this.findById(id)
  }

  async recordReceipt(id: string, amount: number): Promise<void> {
    await ShopModel.updateOne(
      { _id: id },
      { $inc: { receiptCount: 1, totalSales: amount } },
      { session: this.session }
    )
  }

  async revertReceipt(id: string, amount: number): Promise<void> {
    await ShopModel.updateOne(
      { _id: id },
      { $inc: { receiptCount: -1, totalSales: -amount } },
      { session: this.session }
    )
  }

  async listMissingCoordinates(limit: number, maxAttempts: number): Promise<Shop[]> {
    const docs = await ShopModel.find({ latitude: null, geocodeAttempts: { $lt: maxAttempts } })
      .sort({ geocodeAttempts: 1, createdAt: 1 })
      .limit(limit)
      .session(this.session ?? null)
    return docs.map(toShop)
  }

  async recordGeocodeAttempt(id: string): Promise<void> {
    await ShopModel.updateOne({ _id: id }, { $inc: { geocodeAttempts: 1 } }, { session: this.session })
  }

  async listPopular(page: Pagination): Promise<Page<Shop>> {
    const [docs, total] = await Promise.all([
      ShopModel.find().sort({ receiptCount: -1 }).skip(page.offset).limit(page.limit).session(this.session ?? null),
      ShopModel.countDocuments().session(this.session ?? null),
    ])
    return { items: docs.map(toShop), total }
  }

  async listWithCoordinates(limit: number): Promise<Shop[]> {
    const docs = await ShopModel.find({ latitude: { $ne: null }, longitude: { $ne: null } })
      .sort({ receiptCount: -1 })
      .limit(limit)
      .session(this.session ?? null)
    return docs.map(toShop)
  }

  async count(): Promise<number> {
    return ShopModel.countDocuments().session(this.session ?? null)
  }
}

class MongoReceiptRepository implements ReceiptRepository {
  constructor(private readonly session?: ClientSession) {}

  async create(receipt: NewReceipt): Promise<Receipt> {
    const doc = new ReceiptModel({
      customerPhone: receipt.customerPhone,
      shopId: receipt.shopId ? new Types.ObjectId(receipt.shopId) : null,
      shopName: receipt.shopName,
      amount: receipt.amount,
      currency: receipt.currency,
      items: receipt.items,
      receiptText: receipt.receiptText,
      shopLatitude: receipt.shopCoordinates?.latitude ?? null,
      shopLongitude: receipt.shopCoordinates?.longitude ?? null,
      uploadLatitude: receipt.uploadCoordinates?.latitude ?? null,
      uploadLongitude: receipt.uploadCoordinates?.longitude ?? null,
      uploadAddress: receipt.uploadAddress,
      distanceKm: receipt.verdict.distanceKm,
      fraudCategory: receipt.verdict.category,
      fraudScore: receipt.verdict.score,
      fraudReason: receipt.verdict.reason,
      status: receipt.status,
      submittedAt: receipt.submittedAt,
    })
    await doc.save({ session: this.session })
    return toReceipt(doc)
  }

  async findById(id: string): Promise<Receipt | null> {
    if (!Types.ObjectId.isValid(id)) return null
    const doc = await ReceiptModel.findById(id).session(this.session ?? null)
    return doc ? toReceipt(doc) : null
  }

  async list(filter: ReceiptFilter, page: Pagination, sort: ReceiptSort = 'newest'): Promise<Page<Receipt>> {
    const query: FilterQuery<IReceipt> = {}
    if (filter.customerPhone) query.customerPhone = filter.customerPhone
    if (filter.date) {
      const { start, end } = dayRange(filter.date)
      query.submittedAt = { $gte: start, $lt: end }
    }
    if (filter.status) {
      query.status = filter.status
    } else if (filter.excludeStatuses?.length) {
      query.status = { $nin: filter.excludeStatuses }
    }
    if (filter.fraudCategories?.length) query.fraudCategory = { $in: filter.fraudCategories }

    const order: Record<string, SortOrder> = sort === 'fraudScore'
      ? { fraudScore: -1 as const, submittedAt: -1 as const }
      : { submittedAt: -1 as const }

    const [docs, total] = await Promise.all([
      ReceiptModel.find(query).sort(order).skip(page.offset).limit(page.limit).session(this.session ?? null),
      ReceiptModel.countDocuments(query).session(this.session ?? null),
    ])
    return { items: docs.map(toReceipt), total }
  }

  async findEligible(date: string, status: ReceiptStatus, categories: FraudCategory[]): Promise<Receipt[]> {
    const { start, end } = dayRange(date)
    const docs = await ReceiptModel.find({
      submittedAt: { $gte: start, $lt: end },
      status,
      fraudCategory: { $in: categories },
    })
      .sort({ submittedAt: 1, _id: 1 })
      .session(this.session ?? null)
    return docs.map(toReceipt)
  }

  async markWon(id: string): Promise<boolean> {
    const result = await ReceiptModel.updateOne(
      { _id: id, status: 'processed' },
      { $set: { status: 'won' } },
      { session: this.session }
    )
    return result.modifiedCount === 1
  }

  async applyReview(id: string, fromStatuses: ReceiptStatus[], update: ReviewUpdate): Promise<Receipt | null> {
    if (!Types.ObjectId.isValid(id)) return null
    const doc = await ReceiptModel.findOneAndUpdate(
      { _id: id, status: { $in: fromStatuses }, reviewedAt: null },
      {
        $set: {
          status: update.status,
          fraudReason: update.fraudReason,
          reviewedAt: update.reviewedAt,
          ...(update.fraudCategory && { fraudCategory: update.fraudCategory }),
        },
      },
      { new: true, session: this.session }
    )
    return doc ? toReceipt(doc) : null
  }

  async fraudStats(): Promise<FraudStats> {
    const rows = await ReceiptModel.aggregate<{
      _id: FraudCategory
      count: number
      avgDistance: number | null
      maxDistance: number | null
    }>([
      {
        $group: {
          _id: '$fraudCategory',
          count: { $sum: 1 },
          avgDistance: { $avg: '$distanceKm' },
          maxDistance: { $max: '$distanceKm' },
        },
      },
    ]).session(this.session ?? null)

    const stats: FraudStats = {
      total: 0,
      valid: { count: 0, avgDistanceKm: null, maxDistanceKm: null },
      review: { count: 0, avgDistanceKm: null, maxDistanceKm: null },
      suspicious: { count: 0, avgDistanceKm: null, maxDistanceKm: null },
      flagged: { count: 0, avgDistanceKm: null, maxDistanceKm: null },
    }
    for (const row of rows) {
      if (!FRAUD_CATEGORIES.includes(row._id)) continue
      stats[row._id] = {
        count: row.count,
        avgDistanceKm: row.avgDistance === null ? null : Math.round(row.avgDistance * 100) / 100,
        maxDistanceKm: row.maxDistance,
      }
      stats.total += row.count
    }
    return stats
  }

  async listUploadLocations(date: string | undefined, limit: number): Promise<UploadLocation[]> {
    const query: FilterQuery<IReceipt> = { uploadLatitude: { $ne: null }, uploadLongitude: { $ne: null } }
    if (date) {
      const { start, end } = dayRange(date)
      query.submittedAt = { $gte: start, $lt: end }
    }
    const docs = await ReceiptModel.find(query).sort({ submittedAt: -1 }).limit(limit).session(this.session ?? null)

    const locations: UploadLocation[] = []
    for (const doc of docs) {
      const uploadCoordinates = toCoordinates(doc.uploadLatitude, doc.uploadLongitude)
      if (!uploadCoordinates) continue
      locations.push({
        id: doc._id.toString(),
        customerPhone: doc.customerPhone,
        shopName: doc.shopName ?? null,
        amount: doc.amount,
        fraudCategory: doc.fraudCategory,
        uploadCoordinates,
        uploadAddress: doc.uploadAddress ?? null,
        submittedAt: doc.submittedAt,
      })
    }
    return locations
  }

  async spendingByDay(since: Date): Promise<DailySpending[]> {
    const rows = await ReceiptModel.aggregate<{ _id: string; amount: number; receipts: number }>([
      { $match: { submittedAt: { $gte: since }, status: { $ne: 'rejected' } } },
      {
        $group: {
          _id: { $dateToString: { format: '%Y-%m-%d', date: '$submittedAt', timezone: 'UTC' } },
          amount: { $sum: '$amount' },
          receipts: { $sum: 1 },
        },
      },
      { $sort: { _id: 1 } },
    ]).session(this.session ?? null)

    return rows.map((row) => ({ date: row._id, amount: row.amount, receipts: row.receipts }))
  }

  async countByHour(): Promise<HourlyCount[]> {
    const rows = await ReceiptModel.aggregate<{ _id: number; count: number }>([
      { $group: { _id: { $hour: { date: '$submittedAt', timezone: 'UTC' } }, count: { $sum: 1 } } },
      { $sort: { _id: 1 } },
    ]).session(this.session ?? null)

    return rows.map((row) => ({ hour: row._id, count: row.count }))
  }

  async count(): Promise<number> {
    return ReceiptModel.countDocuments().session(this.session ?? null)
  }
}

class MongoDrawRepository implements DrawRepository {
  constructor(private readonly session?: ClientSession) {}

  async findByDate(drawDate: string): Promise<Draw | null> {
    const doc = await DrawModel.findOne({ drawDate }).session(this.session ?? null)
    return doc ? toDraw(doc) : null
  }

  async claim(drawDate: string, claimId: string, now: Date, staleBefore: Date): Promise<Draw | null> {
    const takenOver = await DrawModel.findOneAndUpdate(
      {
        drawDate,
        $or: [
          { status: 'no_entries' },
          { status: 'pending', claimedAt: { $lt: staleBefore } },
        ],
      },
      { $set: { status: 'pending', claimId, claimedAt: now, totalReceipts: 0, totalAmount: 0 } },
      { new: true, session: this.session }
    )
    if (takenOver) return toDraw(takenOver)

    try {
      const doc = new DrawModel({ drawDate, status: 'pending', claimId, claimedAt: now })
      await doc.save({ session: this.session })
      return toDraw(doc)
    } catch (error) {
      // Unique drawDate: another run holds or completed this date
      if (isDuplicateKey(error)) return null
      throw error
    }
  }

  async markNoEntries(drawDate: string, claimId: string): Promise<Draw | null> {
    const doc = await DrawModel.findOneAndUpdate(
      { drawDate, claimId, status: 'pending' },
      { $set: { status: 'no_entries', totalReceipts: 0, totalAmount: 0, completedAt: new Date() } },
      { new: true, session: this.session }
    )
    return doc ? toDraw(doc) : null
  }

  async complete(drawDate: string, claimId: string, outcome: DrawOutcome): Promise<Draw | null> {
    const doc = await DrawModel.findOneAndUpdate(
      { drawDate, claimId, status: 'pending' },
      {
        $set: {
          status: 'completed',
          totalReceipts: outcome.totalReceipts,
          totalAmount: outcome.totalAmount,
          winnerReceiptId: new Types.ObjectId(outcome.winnerReceiptId),
          winnerPhone: outcome.winnerPhone,
          prizeAmount: outcome.prizeAmount,
          completedAt: outcome.completedAt,
        },
      },
      { new: true, session: this.session }
    )
    return doc ? toDraw(doc) : null
  }

  async setWinnerNotified(drawDate: string, notified: boolean): Promise<void> {
    await DrawModel.updateOne({ drawDate }, { $set: { winnerNotified: notified } }, { session: this.session })
  }

  async list(page: Pagination): Promise<Page<Draw>> {
    const [docs, total] = await Promise.all([
      DrawModel.find().sort({ drawDate: -1 }).skip(page.offset).limit(page.limit).session(this.session ?? null),
      DrawModel.countDocuments().session(this.session ?? null),
    ])
    return { items: docs.map(toDraw), total }
  }

  async listByWinner(phone: string): Promise<Draw[]> {
    const docs = await DrawModel.find({ winnerPhone: phone, status: 'completed' })
      .sort({ drawDate: -1 })
      .limit(100)
      .session(this.session ?? null)
    return docs.map(toDraw)
  }

  async countCompleted(): Promise<number> {
    return DrawModel.countDocuments({ status: 'completed' }).session(this.session ?? null)
  }
}

/**
 * MongoDB-backed store. A store created inside `withTransaction` binds every
 * query to the transaction's session.
 */
export class MongoStore implements Store {
  readonly customers: CustomerRepository
  readonly shops: ShopRepository
  readonly receipts: ReceiptRepository
  readonly draws: DrawRepository

  constructor(
    private readonly connection: Connection = mongoose.connection,
    private readonly session?: ClientSession
  ) {
    this.customers = new MongoCustomerRepository(session)
    this.shops = new MongoShopRepository(session)
    this.receipts = new MongoReceiptRepository(session)
    this.draws = new MongoDrawRepository(session)
  }

  async withTransaction<T>(work: (tx: Store) => Promise<T>): Promise<T> {
    if (this.session) return work(this)
    return this.connection.transaction((session) => work(new MongoStore(this.connection, session)))
  }
}
