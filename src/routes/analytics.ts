import type { FastifyInstance } from 'fastify'
import type { RouteOptions } from '.'
import { SpendingQuerySchema } from '../schemas/analytics.schema'

export async function analyticsRoutes(fastify: FastifyInstance, { services }: RouteOptions) {
  const { query } = services

  fastify.get('/analytics/overview', async () => query.overview())

  fastify.get('/analytics/spending-by-day', async (request) => {
    const { days } = SpendingQuerySchema.parse(request.query)
    return { days, data: await query.spendingByDay(days) }
  })

  fastify.get('/analytics/receipts-by-hour', async () => ({ data: await query.receiptsByHour() }))
}
