import { z } from 'zod'

const phone = z.string().min(1, 'phone_number is required')

/**
 * Inbound chat event relayed by the chat gateway
 */
export const ChatEventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('text'),
    phone_number: phone,
    text: z.string().max(10_000),
  }),
  z.object({
    type: z.literal('location'),
    phone_number: phone,
    latitude: z.number().finite(),
    longitude: z.number().finite(),
  }),
  z.object({
    type: z.literal('image'),
    phone_number: phone,
    image_data: z.string().min(1, 'image_data is required'),
    mime_type: z.string().default('image/jpeg'),
    latitude: z.number().finite().optional(),
    longitude: z.number().finite().optional(),
  }),
])

export type ChatEvent = z.infer<typeof ChatEventSchema>
