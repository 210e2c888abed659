import { z } from 'zod'
import { DateParamSchema } from './common.schema'

export const MapReceiptsQuerySchema = DateParamSchema.partial()

// Range is checked by the query service
export const SpendingQuerySchema = z.object({
  days: z.coerce.number().int().default(30),
})
