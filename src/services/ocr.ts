import type { FastifyBaseLogger } from 'fastify'
import { z } from 'zod'
import type { ReceiptItem } from '../types'

/**
 * Shape returned by the OCR service, validated before it reaches ingestion
 */
export const OcrResultSchema = z
  .object({
    shop_name: z.string().trim().min(1).nullish(),
    shop_address: z.string().trim().min(1).nullish(),
    amount: z.number().nullish(),
    items: z
      .array(z.object({ name: z.string().trim().min(1), price: z.number().nonnegative() }))
      .default([]),
    raw_text: z.string().nullish(),
  })
  .transform((result) => ({
    shopName: result.shop_name ?? null,
    address: result.shop_address ?? null,
    amount: result.amount ?? null,
    items: result.items,
    rawText: result.raw_text ?? null,
  }))

export interface OcrResult {
  shopName: string | null
  address: string | null
  amount: number | null
  items: ReceiptItem[]
  rawText: string | null
}

export interface OcrProvider {
  extract(imageBase64: string, mimeType: string): Promise<OcrResult>
}

export class HttpOcrProvider implements OcrProvider {
  constructor(
    private readonly url: string,
    private readonly logger: FastifyBaseLogger,
    private readonly timeoutMs: number = 60_000
  ) {}

  async extract(imageBase64: string, mimeType: string): Promise<OcrResult> {
    const started = Date.now()
    const response = await fetch(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ image_data: imageBase64, mime_type: mimeType }),
      signal: AbortSignal.timeout(this.timeoutMs),
    })

    if (!response.ok) {
      throw new Error(`OCR service responded with ${response.status}`)
    }

    const result = OcrResultSchema.parse(await response.json())
    this.logger.debug({ durationMs: Date.now() - started, shopName: result.shopName, amount: result.amount }, 'Receipt image extracted')
    return result
  }
}
