import { z } from 'zod'
import { FRAUD_CATEGORIES, RECEIPT_STATUSES } from '../types'
import { CoordinatesSchema, PaginationQuerySchema } from './common.schema'

export const ReceiptItemSchema = z.object({
  name: z.string().trim().min(1).max(200),
  price: z.number().finite().nonnegative(),
})

/**
 * Inbound receipt event
 *
 * Phone and amount are checked by the ingestion pipeline, which answers
 * with the customer-facing validation messages.
 */
export const ReceiptEventSchema = z.object({
  customer_phone: z.string().default(''),
  amount: z.number().optional(),
  currency: z.string().trim().length(3).optional(),
  shop_name: z.string().max(200).optional(),
  shop_address: z.string().max(300).optional(),
  receipt_text: z.string().max(10_000).optional(),
  items: z.array(ReceiptItemSchema).max(200).optional(),
  shop_coords: CoordinatesSchema.nullish(),
  upload_coords: CoordinatesSchema.nullish(),
})

export const ReceiptListQuerySchema = PaginationQuerySchema.extend({
  date: z.string().optional(),
  status: z.enum(RECEIPT_STATUSES).optional(),
  fraudCategory: z.enum(FRAUD_CATEGORIES).optional(),
})
