import mongoose, { Schema, Document, Types } from 'mongoose'

export interface ICustomer extends Document<Types.ObjectId> {
  phone: string
  totalReceipts: number
  totalSpent: number
  totalWins: number
  totalWinnings: number
  lastLatitude?: number | null
  lastLongitude?: number | null
  lastLocationAt?: Date | null
  createdAt: Date
  updatedAt: Date
}

const CustomerSchema = new Schema<ICustomer>({
  phone: { type: String, required: true, unique: true, index: true },
  totalReceipts: { type: Number, default: 0 },
  totalSpent: { type: Number, default: 0 },
  totalWins: { type: Number, default: 0 },
  totalWinnings: { type: Number, default: 0 },
  lastLatitude: { type: Number, default: null },
  lastLongitude: { type: Number, default: null },
  lastLocationAt: { type: Date, default: null },
}, { timestamps: true })

// Top spenders
CustomerSchema.index({ totalSpent: -1 })

export const Customer = mongoose.model<ICustomer>('Customer', CustomerSchema)
