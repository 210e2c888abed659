import Fastify from 'fastify'
import dotenv from 'dotenv'
import path from 'path'

// Load env vars
dotenv.config({ path: path.join(__dirname, '../.env') })

import { loadConfig } from './config'
import { connectDB, disconnectDB } from './database'
import { buildApp } from './app'
import { MongoStore } from './repositories/mongo'
import { FraudClassifier } from './services/fraud'
import { ReceiptIngestionService } from './services/ingestion'
import { DrawService } from './services/draw'
import { HttpWinnerNotifier, LogOnlyWinnerNotifier, type WinnerNotifier } from './services/notifier'
import { SchedulerService } from './services/scheduler'
import { NominatimGeocoder, ShopGeocodingService } from './services/geocoding'
import { HttpOcrProvider } from './services/ocr'
import { QueryService } from './services/query'
import { ChatService } from './services/chat'

const config = loadConfig()

// Create Fastify instance
const fastify = Fastify({
  logger: {
    level: config.env === 'production' ? 'info' : 'debug',
  },
})

// Startup
async function start() {
  try {
    fastify.log.info('='.repeat(50))
    fastify.log.info('Receipt Rewards Backend Starting...')
    fastify.log.info('='.repeat(50))

    // Connect to MongoDB
    await connectDB(config.mongoUri, fastify.log)

    const store = new MongoStore()
    const classifier = new FraudClassifier(config.fraud)

    const notifier: WinnerNotifier = config.chat.serviceUrl
      ? new HttpWinnerNotifier(config.chat.serviceUrl, fastify.log.child({ module: 'notifier' }))
      : new LogOnlyWinnerNotifier(fastify.log.child({ module: 'notifier' }))
    if (!config.chat.serviceUrl) {
      fastify.log.warn('CHAT_SERVICE_URL not set, winners will not be notified')
    }

    const geocoder = config.geocoder.url ? new NominatimGeocoder(config.geocoder.url) : null
    const geocoding = geocoder
      ? new ShopGeocodingService(store, geocoder, fastify.log.child({ module: 'geocoding' }))
      : null
    if (!geocoder) {
      fastify.log.warn('GEOCODER_URL not set, shop geocoding and upload addresses disabled')
    }

    const ocr = config.ocrServiceUrl
      ? new HttpOcrProvider(config.ocrServiceUrl, fastify.log.child({ module: 'ocr' }))
      : null
    if (!ocr) {
      fastify.log.warn('OCR_SERVICE_URL not set, receipt photos disabled')
    }

    const ingestion = new ReceiptIngestionService(store, classifier, fastify.log.child({ module: 'ingestion' }), {
      defaultCurrency: config.defaultCurrency,
      reverseGeocoder: geocoder ?? undefined,
    })
    const draws = new DrawService(store, notifier, fastify.log.child({ module: 'draw' }), {
      claimTimeoutMs: config.draw.claimTimeoutMs,
    })
    const scheduler = new SchedulerService(draws, fastify.log.child({ module: 'scheduler' }), {
      timeOfDay: config.draw.timeOfDay,
      catchUpDays: config.draw.catchUpDays,
      geocodeIntervalMinutes: config.geocoder.intervalMinutes,
    }, geocoding ?? undefined)
    const query = new QueryService(store, classifier, fastify.log.child({ module: 'query' }))
    const chat = new ChatService(ingestion, query, ocr, fastify.log.child({ module: 'chat' }), {
      locationMaxAgeMinutes: config.chat.locationMaxAgeMinutes,
      drawTimeUtc: scheduler.status().drawTimeUtc,
    })

    await buildApp({
      fastify,
      services: { ingestion, query, scheduler, geocoding, chat },
      frontendUrl: config.frontendUrl,
      chatWebhookSecret: config.chat.webhookSecret,
    })

    // Start draw scheduler
    await scheduler.start()

    // Start server
    await fastify.listen({ port: config.port, host: config.host })
    fastify.log.info({ port: config.port, host: config.host, frontend: config.frontendUrl }, 'Server started')

    // Graceful shutdown
    const shutdown = async (signal: string) => {
      fastify.log.info({ signal }, 'Shutting down server')
      scheduler.stop()
      await fastify.close()
      await draws.settled()
      await disconnectDB()
      process.exit(0)
    }

    process.on('SIGTERM', () => void shutdown('SIGTERM'))
    process.on('SIGINT', () => void shutdown('SIGINT'))

  } catch (error) {
    fastify.log.error({ err: error }, 'Failed to start server')
    process.exit(1)
  }
}

void start()
