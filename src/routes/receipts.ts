import type { FastifyInstance } from 'fastify'
import type { RouteOptions } from '.'
import { ReceiptEventSchema, ReceiptListQuerySchema } from '../schemas/receipt.schema'
import { PaginationQuerySchema } from '../schemas/common.schema'
import { parseReceiptText } from '../services/receiptParser'
import { sendError, ErrorMessages } from '../utils/errors'
import { isValidObjectId, validatePagination } from '../utils/validation'

export async function receiptRoutes(fastify: FastifyInstance, { services }: RouteOptions) {
  const { ingestion, query } = services

  // Submit a receipt event
  fastify.post('/receipts', async (request, reply) => {
    const body = ReceiptEventSchema.parse(request.body)

    // Text-only submissions are parsed for whatever the event left out
    const parsed = body.receipt_text ? parseReceiptText(body.receipt_text) : null

    const { receipt, shop } = await ingestion.ingest({
      customerPhone: body.customer_phone,
      amount: body.amount ?? parsed?.amount ?? Number.NaN,
      currency: body.currency,
      shopName: body.shop_name ?? parsed?.shopName,
      shopAddress: body.shop_address ?? parsed?.address,
      receiptText: body.receipt_text,
      items: body.items ?? parsed?.items,
      shopCoords: body.shop_coords,
      uploadCoords: body.upload_coords,
    })

    return reply.status(201).send({ receipt, shop })
  })

  // List receipts
  fastify.get('/receipts', async (request) => {
    const { limit, offset, date, status, fraudCategory } = ReceiptListQuerySchema.parse(request.query)
    const page = validatePagination(limit, offset)

    const result = await query.listReceipts(
      { date, status, fraudCategories: fraudCategory ? [fraudCategory] : undefined },
      page
    )
    return { receipts: result.items, total: result.total, ...page }
  })

  // Get receipt details
  fastify.get<{ Params: { id: string } }>('/receipts/:id', async (request, reply) => {
    const { id } = request.params

    if (!isValidObjectId(id)) {
      return sendError(reply, 400, ErrorMessages.INVALID_ID)
    }

    return query.getReceipt(id)
  })

  // Receipts of one customer
  fastify.get<{ Params: { phone: string } }>('/customers/:phone/receipts', async (request) => {
    const { phone } = request.params
    const { limit, offset } = PaginationQuerySchema.parse(request.query)
    const page = validatePagination(limit, offset)

    const result = await query.receiptsByCustomer(phone, page)
    return { receipts: result.items, total: result.total, ...page }
  })
}
