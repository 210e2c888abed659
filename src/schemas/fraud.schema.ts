import { z } from 'zod'

export const ReviewBodySchema = z.object({
  action: z.enum(['approve', 'reject']),
  reason: z.string().max(300).optional(),
})
