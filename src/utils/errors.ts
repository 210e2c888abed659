import type { FastifyReply, FastifyRequest } from 'fastify'
import mongoose from 'mongoose'
import { ZodError } from 'zod'

export interface ErrorResponse {
  error: string
  message?: string
  details?: unknown
}

export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public details?: unknown
  ) {
    super(message)
    this.name = 'AppError'
  }
}

export class InvalidCoordinateError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, message, details)
    this.name = 'InvalidCoordinateError'
  }
}

export class InvalidAmountError extends AppError {
  constructor(details?: unknown) {
    super(400, ErrorMessages.INVALID_AMOUNT, details)
    this.name = 'InvalidAmountError'
  }
}

export class MissingCustomerError extends AppError {
  constructor(details?: unknown) {
    super(400, ErrorMessages.MISSING_CUSTOMER, details)
    this.name = 'MissingCustomerError'
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = ErrorMessages.NOT_FOUND) {
    super(404, message)
    this.name = 'NotFoundError'
  }
}

export class ReviewConflictError extends AppError {
  constructor(message: string, details?: unknown) {
    super(409, message, details)
    this.name = 'ReviewConflictError'
  }
}

/**
 * Raised when a write would alter a draw that is already completed
 * or whose claim was taken over by another run.
 */
export class DuplicateDrawError extends AppError {
  constructor(drawDate: string) {
    super(409, ErrorMessages.DRAW_ALREADY_COMPLETED, { drawDate })
    this.name = 'DuplicateDrawError'
  }
}

export class PersistenceUnavailableError extends AppError {
  constructor(details?: unknown) {
    super(503, ErrorMessages.DATABASE_UNAVAILABLE, details)
    this.name = 'PersistenceUnavailableError'
  }
}

/**
 * Send standardized error response with logging
 */
export function sendError(
  reply: FastifyReply,
  statusCode: number,
  error: string,
  message?: string,
  details?: unknown
) {
  const response: ErrorResponse = {
    error,
    ...(message && { message }),
    ...(details !== undefined && { details }),
  }

  if (statusCode >= 500) {
    reply.log.error({ statusCode, error, message, details }, 'Server error')
  } else if (statusCode >= 400) {
    reply.log.warn({ statusCode, error, message, details }, 'Client error')
  }

  return reply.status(statusCode).send(response)
}

/**
 * Common error responses
 */
export const ErrorMessages = {
  // Auth errors (401/403)
  FORBIDDEN: 'Forbidden',
  INVALID_WEBHOOK_SECRET: 'Invalid webhook secret',

  // Not found errors (404)
  NOT_FOUND: 'Resource not found',
  CUSTOMER_NOT_FOUND: 'Customer not found',
  SHOP_NOT_FOUND: 'Shop not found',
  RECEIPT_NOT_FOUND: 'Receipt not found',
  DRAW_NOT_FOUND: 'Draw not found',

  // Validation errors (400)
  INVALID_INPUT: 'Invalid input',
  INVALID_AMOUNT: 'Could not process receipt: invalid amount',
  MISSING_CUSTOMER: 'Could not process receipt: missing or malformed phone number',
  INVALID_COORDINATE: 'Invalid coordinate',
  INVALID_DATE: 'Invalid date. Expected YYYY-MM-DD',
  INVALID_DAYS: 'Invalid day count. Expected 1-365',
  INVALID_ID: 'Invalid ID format',
  INVALID_PHONE: 'Invalid phone number',

  // Conflicts (409)
  RECEIPT_ALREADY_REVIEWED: 'Receipt has already been reviewed',
  RECEIPT_NOT_REVIEWABLE: 'Receipt can no longer be reviewed',
  DRAW_ALREADY_COMPLETED: 'Draw already completed for this date',

  // Server errors (5xx)
  INTERNAL_ERROR: 'Internal server error',
  DATABASE_UNAVAILABLE: 'Database unavailable',
  GEOCODER_DISABLED: 'Geocoder is not configured',
} as const

function isPersistenceFailure(error: Error): boolean {
  return (
    error instanceof mongoose.mongo.MongoNetworkError ||
    error instanceof mongoose.mongo.MongoServerSelectionError
  )
}

/**
 * Error handler for uncaught errors in async routes
 */
export function errorHandler(error: Error, request: FastifyRequest, reply: FastifyReply) {
  if (error instanceof AppError) {
    return sendError(reply, error.statusCode, error.message, undefined, error.details)
  }

  if (error instanceof ZodError) {
    return sendError(reply, 400, ErrorMessages.INVALID_INPUT, undefined, error.flatten())
  }

  if (isPersistenceFailure(error)) {
    const unavailable = new PersistenceUnavailableError()
    return sendError(reply, unavailable.statusCode, unavailable.message, error.message)
  }

  // Fastify's own validation and body parsing errors carry a 4xx status code
  const statusCode = 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : 500
  if (statusCode < 500) {
    return sendError(reply, statusCode, ErrorMessages.INVALID_INPUT, error.message)
  }

  reply.log.error({ err: error, url: request.url, method: request.method }, 'Unexpected error')

  return sendError(reply, 500, ErrorMessages.INTERNAL_ERROR, error.message)
}
