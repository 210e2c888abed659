import type { FastifyInstance } from 'fastify'
import type { RouteOptions } from '.'
import { PaginationQuerySchema } from '../schemas/common.schema'
import { sendError, ErrorMessages } from '../utils/errors'
import { isValidObjectId, validatePagination } from '../utils/validation'

export async function shopRoutes(fastify: FastifyInstance, { services }: RouteOptions) {
  const { query } = services

  // Shops by receipt count
  fastify.get('/shops', async (request) => {
    const { limit, offset } = PaginationQuerySchema.parse(request.query)
    const page = validatePagination(limit, offset)

    const result = await query.listShops(page)
    return { shops: result.items, total: result.total, ...page }
  })

  fastify.get<{ Params: { id: string } }>('/shops/:id', async (request, reply) => {
    const { id } = request.params

    if (!isValidObjectId(id)) {
      return sendError(reply, 400, ErrorMessages.INVALID_ID)
    }

    return query.getShop(id)
  })
}
