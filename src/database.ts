import mongoose from 'mongoose'
import type { FastifyBaseLogger } from 'fastify'

/**
 * Connect to MongoDB. Transactions require a replica set or Atlas cluster.
 */
export async function connectDB(uri: string, logger: FastifyBaseLogger): Promise<typeof mongoose> {
  mongoose.set('strictQuery', true)

  mongoose.connection.on('disconnected', () => logger.warn('MongoDB disconnected'))
  mongoose.connection.on('reconnected', () => logger.info('MongoDB reconnected'))

  const connection = await mongoose.connect(uri, { serverSelectionTimeoutMS: 10000 })
  await Promise.all(Object.values(connection.models).map((model) => model.createIndexes()))

  logger.info({ db: connection.connection.name }, 'MongoDB connected')
  return connection
}

export async function disconnectDB(): Promise<void> {
  await mongoose.disconnect()
}
