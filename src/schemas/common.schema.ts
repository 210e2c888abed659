import { z } from 'zod'

/**
 * A latitude/longitude pair. Ranges are checked by the geodistance
 * utility so out-of-range points can degrade instead of failing.
 */
export const CoordinatesSchema = z.object({
  latitude: z.number().finite(),
  longitude: z.number().finite(),
})

export const PaginationQuerySchema = z.object({
  limit: z.coerce.number().int().optional(),
  offset: z.coerce.number().int().optional(),
})

export const DateParamSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'date must be YYYY-MM-DD'),
})
