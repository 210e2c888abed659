import type { FastifyInstance } from 'fastify'
import type { RouteOptions } from '.'
import { MapReceiptsQuerySchema } from '../schemas/analytics.schema'

export async function mapRoutes(fastify: FastifyInstance, { services }: RouteOptions) {
  const { query } = services

  // Geocoded shops
  fastify.get('/map/shops', async () => {
    const shops = await query.mapShops()
    return { shops, total: shops.length }
  })

  // Upload locations, optionally for one date
  fastify.get('/map/receipts', async (request) => {
    const { date } = MapReceiptsQuerySchema.parse(request.query)
    const receipts = await query.mapReceipts(date)
    return { receipts, total: receipts.length }
  })
}
