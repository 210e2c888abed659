import type { FastifyInstance } from 'fastify'
import type { RouteOptions } from '.'
import { DrawRunBodySchema, GeocodeBodySchema } from '../schemas/draw.schema'
import { sendError, ErrorMessages } from '../utils/errors'

export async function adminRoutes(fastify: FastifyInstance, { services }: RouteOptions) {
  const { scheduler, geocoding } = services

  // Run (or return) the draw for a date, default today
  fastify.post('/admin/draws/run', async (request) => {
    const { date } = DrawRunBodySchema.parse(request.body ?? {})
    const result = await scheduler.trigger(date)

    return {
      success: true,
      alreadyCompleted: result.alreadyCompleted,
      draw: result.draw,
      winner: result.winner,
    }
  })

  fastify.get('/admin/scheduler', async () => scheduler.status())

  // Geocode shops that still lack coordinates
  fastify.post('/admin/shops/geocode', async (request, reply) => {
    if (!geocoding) {
      return sendError(reply, 503, ErrorMessages.GEOCODER_DISABLED)
    }

    const { limit } = GeocodeBodySchema.parse(request.body ?? {})
    const result = await geocoding.backfill(limit)
    return { success: true, ...result }
  })
}
