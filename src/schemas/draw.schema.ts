import { z } from 'zod'

export const DrawRunBodySchema = z
  .object({
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'date must be YYYY-MM-DD').optional(),
  })
  .default({})

export const GeocodeBodySchema = z
  .object({
    limit: z.number().int().min(1).max(100).optional(),
  })
  .default({})
