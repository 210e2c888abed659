import type { FastifyInstance } from 'fastify'
import type { RouteOptions } from '.'
import { ChatEventSchema } from '../schemas/chat.schema'
import { sendError, ErrorMessages } from '../utils/errors'

export async function chatRoutes(fastify: FastifyInstance, { services, chatWebhookSecret }: RouteOptions) {
  const { chat } = services

  // Inbound chat events from the chat gateway
  fastify.post('/chat/webhook', async (request, reply) => {
    // Verify the gateway's shared secret
    const secret = request.headers['x-chat-webhook-secret']
    if (chatWebhookSecret && secret !== chatWebhookSecret) {
      return sendError(reply, 403, ErrorMessages.FORBIDDEN, ErrorMessages.INVALID_WEBHOOK_SECRET)
    }

    const event = ChatEventSchema.parse(request.body)
    fastify.log.info({ phone: event.phone_number, type: event.type }, 'Chat webhook received')

    const replyText = await chat.handle(event)
    return { reply: replyText, success: true }
  })
}
