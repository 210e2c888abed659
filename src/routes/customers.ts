import type { FastifyInstance } from 'fastify'
import { z } from 'zod'
import type { RouteOptions } from '.'
import { PaginationQuerySchema } from '../schemas/common.schema'
import { validatePagination } from '../utils/validation'

const LocationBodySchema = z.object({
  phone_number: z.string().min(1),
  latitude: z.number().finite(),
  longitude: z.number().finite(),
})

export async function customerRoutes(fastify: FastifyInstance, { services }: RouteOptions) {
  const { query } = services

  // Customers by total spend
  fastify.get('/customers', async (request) => {
    const { limit, offset } = PaginationQuerySchema.parse(request.query)
    const page = validatePagination(limit, offset)

    const result = await query.listCustomers(page)
    return { customers: result.items, total: result.total, ...page }
  })

  fastify.get<{ Params: { phone: string } }>('/customers/:phone', async (request) => {
    const { phone } = request.params
    return query.getCustomer(phone)
  })

  // Record a location shared over chat
  fastify.post('/customers/location', async (request) => {
    const body = LocationBodySchema.parse(request.body)
    const customer = await query.recordLocation(body.phone_number, {
      latitude: body.latitude,
      longitude: body.longitude,
    })
    return { success: true, customer }
  })
}
