import type { FastifyInstance } from 'fastify'
import type { AppServices } from '../app'
import { receiptRoutes } from './receipts'
import { customerRoutes } from './customers'
import { shopRoutes } from './shops'
import { fraudRoutes } from './fraud'
import { drawRoutes } from './draws'
import { adminRoutes } from './admin'
import { chatRoutes } from './chat'
import { analyticsRoutes } from './analytics'
import { mapRoutes } from './map'

export type RouteOptions = {
  services: AppServices
  chatWebhookSecret?: string
}

export async function registerRoutes(fastify: FastifyInstance, options: RouteOptions) {
  // API prefix
  await fastify.register(async (api) => {
    await api.register(receiptRoutes, options)
    await api.register(customerRoutes, options)
    await api.register(shopRoutes, options)
    await api.register(fraudRoutes, options)
    await api.register(drawRoutes, options)
    await api.register(adminRoutes, options)
    await api.register(chatRoutes, options)
    await api.register(analyticsRoutes, options)
    await api.register(mapRoutes, options)
  }, { prefix: '/api' })

  // Health check
  fastify.get('/health', async () => ({ status: 'ok', timestamp: new Date().toISOString() }))
}
