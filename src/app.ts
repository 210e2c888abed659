import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify'
import cors from '@fastify/cors'
import helmet from '@fastify/helmet'
import rateLimit from '@fastify/rate-limit'
import { registerRoutes } from './routes'
import { errorHandler } from './utils/errors'
import type { ReceiptIngestionService } from './services/ingestion'
import type { QueryService } from './services/query'
import type { SchedulerService } from './services/scheduler'
import type { ShopGeocodingService } from './services/geocoding'
import type { ChatService } from './services/chat'

export interface AppServices {
  ingestion: ReceiptIngestionService
  query: QueryService
  scheduler: SchedulerService
  geocoding: ShopGeocodingService | null
  chat: ChatService
}

export interface AppOptions {
  services: AppServices
  frontendUrl: string
  chatWebhookSecret?: string
  /** Existing instance to register on; a new one is created otherwise */
  fastify?: FastifyInstance
  logger?: FastifyServerOptions['logger']
  /** Requests per minute per client; false disables limiting */
  rateLimitMax?: number | false
}

/**
 * Build the HTTP application around already constructed services
 */
export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const fastify = options.fastify ?? Fastify({ logger: options.logger ?? false })

  // Security headers (MUST BE FIRST)
  await fastify.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
  })

  // CORS (SECOND)
  await fastify.register(cors, {
    origin: [options.frontendUrl, 'http://localhost:3000'],
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'x-chat-webhook-secret'],
    preflight: true,
    preflightContinue: false,
    optionsSuccessStatus: 204,
  })

  // Rate limiting (THIRD)
  if (options.rateLimitMax !== false) {
    await fastify.register(rateLimit, {
      max: options.rateLimitMax ?? 100,
      timeWindow: '1 minute',
    })
  }

  fastify.setErrorHandler(errorHandler)

  await registerRoutes(fastify, {
    services: options.services,
    chatWebhookSecret: options.chatWebhookSecret,
  })

  return fastify
}
