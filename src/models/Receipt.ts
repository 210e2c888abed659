import mongoose, { Schema, Document, Types } from 'mongoose'
import { FRAUD_CATEGORIES, RECEIPT_STATUSES, type FraudCategory, type ReceiptItem, type ReceiptStatus } from '../types'

export interface IReceipt extends Document<Types.ObjectId> {
  customerPhone: string
  shopId?: Types.ObjectId | null
  shopName?: string | null
  amount: number
  currency: string
  items: ReceiptItem[]
  receiptText?: string | null
  shopLatitude?: number | null
  shopLongitude?: number | null
  uploadLatitude?: number | null
  uploadLongitude?: number | null
  uploadAddress?: string | null
  distanceKm?: number | null
  fraudCategory: FraudCategory
  fraudScore: number
  fraudReason: string
  status: ReceiptStatus
  submittedAt: Date
  reviewedAt?: Date | null
  createdAt: Date
  updatedAt: Date
}

const ReceiptSchema = new Schema<IReceipt>({
  customerPhone: { type: String, required: true, index: true },
  shopId: { type: Schema.Types.ObjectId, ref: 'Shop', default: null, index: true },
  shopName: { type: String, default: null },
  amount: { type: Number, required: true, min: 0 },
  currency: { type: String, required: true },
  items: [{
    name: { type: String, required: true },
    price: { type: Number, required: true },
  }],
  receiptText: { type: String, default: null },
  shopLatitude: { type: Number, default: null },
  shopLongitude: { type: Number, default: null },
  uploadLatitude: { type: Number, default: null },
  uploadLongitude: { type: Number, default: null },
  uploadAddress: { type: String, default: null },
  distanceKm: { type: Number, default: null },
  fraudCategory: { type: String, enum: [...FRAUD_CATEGORIES], required: true },
  fraudScore: { type: Number, required: true, min: 0, max: 100 },
  fraudReason: { type: String, required: true },
  status: { type: String, enum: [...RECEIPT_STATUSES], required: true, default: 'processed' },
  submittedAt: { type: Date, required: true, default: Date.now },
  reviewedAt: { type: Date, default: null },
}, { timestamps: true })

// Draw pool lookup: one UTC day of processed receipts
ReceiptSchema.index({ submittedAt: 1, status: 1, fraudCategory: 1 })

// Customer history
ReceiptSchema.index({ customerPhone: 1, submittedAt: -1 })

// Review queue sorted by score
ReceiptSchema.index({ fraudCategory: 1, fraudScore: -1 })

export const Receipt = mongoose.model<IReceipt>('Receipt', ReceiptSchema)
