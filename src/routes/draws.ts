import type { FastifyInstance } from 'fastify'
import type { RouteOptions } from '.'
import { PaginationQuerySchema } from '../schemas/common.schema'
import { validatePagination } from '../utils/validation'

export async function drawRoutes(fastify: FastifyInstance, { services }: RouteOptions) {
  const { query } = services

  fastify.get('/draws', async (request) => {
    const { limit, offset } = PaginationQuerySchema.parse(request.query)
    const page = validatePagination(limit ?? 30, offset)

    const result = await query.listDraws(page)
    return { draws: result.items, total: result.total, ...page }
  })

  // Wins of one customer
  fastify.get<{ Params: { phone: string } }>('/draws/winner/:phone', async (request) => {
    const { phone } = request.params
    return query.winsByPhone(phone)
  })

  fastify.get<{ Params: { date: string } }>('/draws/:date', async (request) => {
    const { date } = request.params
    return query.getDraw(date)
  })
}
