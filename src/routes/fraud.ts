import type { FastifyInstance } from 'fastify'
import type { RouteOptions } from '.'
import { PaginationQuerySchema } from '../schemas/common.schema'
import { ReviewBodySchema } from '../schemas/fraud.schema'
import { sendError, ErrorMessages } from '../utils/errors'
import { isValidObjectId, validatePagination } from '../utils/validation'

export async function fraudRoutes(fastify: FastifyInstance, { services }: RouteOptions) {
  const { query } = services

  fastify.get('/fraud/stats', async () => query.fraudStats())

  // Review queue, highest fraud score first
  fastify.get('/fraud/flagged', async (request) => {
    const { limit, offset } = PaginationQuerySchema.parse(request.query)
    const page = validatePagination(limit, offset)

    const result = await query.reviewQueue(page)
    return { receipts: result.items, total: result.total, ...page }
  })

  fastify.get('/fraud/thresholds', async () => query.thresholds())

  // Manual approve/reject
  fastify.post<{ Params: { id: string } }>('/fraud/review/:id', async (request, reply) => {
    const { id } = request.params

    if (!isValidObjectId(id)) {
      return sendError(reply, 400, ErrorMessages.INVALID_ID)
    }

    const { action, reason } = ReviewBodySchema.parse(request.body)
    const receipt = await query.reviewReceipt(id, action, reason)
    return { success: true, receipt }
  })
}
