import mongoose, { Schema, Document, Types } from 'mongoose'
import type { DrawStatus } from '../types'

export interface IDraw extends Document<Types.ObjectId> {
  drawDate: string
  status: DrawStatus
  totalReceipts: number
  totalAmount: number
  winnerReceiptId?: Types.ObjectId | null
  winnerPhone?: string | null
  prizeAmount: number
  claimId?: string | null
  claimedAt?: Date | null
  completedAt?: Date | null
  winnerNotified: boolean
  createdAt: Date
  updatedAt: Date
}

const DrawSchema = new Schema<IDraw>({
  // One draw per UTC calendar date (YYYY-MM-DD)
  drawDate: { type: String, required: true, unique: true, match: /^\d{4}-\d{2}-\d{2}$/ },
  status: {
    type: String,
    enum: ['pending', 'completed', 'no_entries'],
    default: 'pending',
    index: true,
  },
  totalReceipts: { type: Number, default: 0 },
  totalAmount: { type: Number, default: 0 },
  winnerReceiptId: { type: Schema.Types.ObjectId, ref: 'Receipt', default: null },
  winnerPhone: { type: String, default: null, index: true },
  prizeAmount: { type: Number, default: 0, min: 0 },
  claimId: { type: String, default: null },
  claimedAt: { type: Date, default: null },
  completedAt: { type: Date, default: null },
  winnerNotified: { type: Boolean, default: false },
}, { timestamps: true })

// Winner history
DrawSchema.index({ winnerPhone: 1, drawDate: -1 })

// Validate outcome before save
DrawSchema.pre('save', function() {
  if (this.status === 'completed' && !this.winnerPhone) {
    throw new Error('A completed draw requires a winner')
  }
})

export const Draw = mongoose.model<IDraw>('Draw', DrawSchema)
