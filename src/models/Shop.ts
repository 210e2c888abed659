import mongoose, { Schema, Document, Types } from 'mongoose'

export interface IShop extends Document<Types.ObjectId> {
  name: string
  normalizedName: string
  address?: string | null
  latitude?: number | null
  longitude?: number | null
  receiptCount: number
  totalSales: number
  geocodeAttempts: number
  createdAt: Date
  updatedAt: Date
}

const ShopSchema = new Schema<IShop>({
  name: { type: String, required: true },
  // One shop per lower-cased, whitespace-collapsed name
  normalizedName: { type: String, required: true, unique: true },
  address: { type: String, default: null },
  latitude: { type: Number, default: null, min: -90, max: 90 },
  longitude: { type: Number, default: null, min: -180, max: 180 },
  receiptCount: { type: Number, default: 0 },
  totalSales: { type: Number, default: 0 },
  geocodeAttempts: { type: Number, default: 0 },
}, { timestamps: true })

// Popular shops
ShopSchema.index({ receiptCount: -1 })

// Geocoding backfill queue
ShopSchema.index({ latitude: 1, geocodeAttempts: 1 })

export const Shop = mongoose.model<IShop>('Shop', ShopSchema)
