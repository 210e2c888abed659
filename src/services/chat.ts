import type { FastifyBaseLogger } from 'fastify'
import type { Coordinates, Receipt, ReceiptStatus } from '../types'
import type { ChatEvent } from '../schemas/chat.schema'
import type { QueryService } from './query'
import type { ReceiptIngestionService, ReceiptSubmission } from './ingestion'
import type { OcrProvider, OcrResult } from './ocr'
import { parseReceiptText } from './receiptParser'
import { isValidCoordinates } from './geo'
import { AppError, ErrorMessages } from '../utils/errors'
import { toDateKey } from '../utils/dates'
import { normalizePhone } from '../utils/validation'

export interface ChatOptions {
  /** A shared location older than this is not used for image uploads; 0 disables reuse */
  locationMaxAgeMinutes?: number
  /** Shown in the status reply, HH:MM */
  drawTimeUtc?: string
  now?: () => Date
}

export const HELP_MESSAGE = [
  '🎰 Welcome to Receipt Rewards!',
  '',
  '📸 Send a photo of your receipt to enter today\'s draw',
  '📍 Share your location first for better tracking',
  '💰 Win back what you spent!',
  '',
  'Commands:',
  '• RECEIPTS - Your recent receipts',
  '• WINS - Your winnings',
  '• BALANCE - Your totals',
  '• STATUS - Today\'s draw',
].join('\n')

export const UNKNOWN_COMMAND = 'I didn\'t understand that. Send HELP for available commands.'

const HELP_COMMANDS = new Set(['help', 'hi', 'hello', 'hey', 'start', '?'])

const STATUS_ICONS: Record<ReceiptStatus, string> = {
  processed: '✅',
  pending_review: '⏳',
  won: '🏆',
  rejected: '❌',
}

function money(amount: number, currency: string = ''): string {
  return `${currency ? `${currency} ` : ''}${amount.toFixed(2)}`
}

/**
 * Turns inbound chat events into replies. Receipt photos go through OCR
 * into the ingestion pipeline; multi-line text is parsed as a receipt.
 */
export class ChatService {
  private readonly locationMaxAgeMs: number
  private readonly drawTimeUtc: string
  private readonly now: () => Date

  constructor(
    private readonly ingestion: ReceiptIngestionService,
    private readonly query: QueryService,
    private readonly ocr: OcrProvider | null,
    private readonly logger: FastifyBaseLogger,
    options: ChatOptions = {}
  ) {
    this.locationMaxAgeMs = (options.locationMaxAgeMinutes ?? 60) * 60 * 1000
    this.drawTimeUtc = options.drawTimeUtc ?? '00:00'
    this.now = options.now ?? (() => new Date())
  }

  async handle(event: ChatEvent): Promise<string> {
    const phone = normalizePhone(event.phone_number)
    if (!phone) {
      throw new AppError(400, ErrorMessages.INVALID_PHONE, { phone: event.phone_number })
    }

    this.logger.debug({ phone, type: event.type }, 'Chat event received')

    switch (event.type) {
      case 'location':
        return this.handleLocation(phone, { latitude: event.latitude, longitude: event.longitude })
      case 'image': {
        const shared = event.latitude !== undefined && event.longitude !== undefined
          ? { latitude: event.latitude, longitude: event.longitude }
          : null
        return this.handleImage(phone, event.image_data, event.mime_type, shared)
      }
      case 'text':
        return this.handleText(phone, event.text)
    }
  }

  private async handleLocation(phone: string, location: Coordinates): Promise<string> {
    if (!isValidCoordinates(location)) {
      return '❌ That location could not be used. Please share it again.'
    }
    await this.query.recordLocation(phone, location)
    return '📍 Location received! Now send your receipt photo.'
  }

  private async handleText(phone: string, raw: string): Promise<string> {
    const text = raw.trim()
    const command = text.toLowerCase()

    if (HELP_COMMANDS.has(command)) return HELP_MESSAGE
    if (command === 'receipts') return this.recentReceipts(phone)
    if (command === 'wins') return this.wins(phone)
    if (command === 'balance') return this.balance(phone)
    if (command === 'status') return this.drawStatus(phone)

    if (text.includes('\n')) {
      const parsed = parseReceiptText(text)
      if (parsed.amount !== null) {
        return this.submit(phone, {
          customerPhone: phone,
          amount: parsed.amount,
          shopName: parsed.shopName,
          shopAddress: parsed.address,
          items: parsed.items,
          receiptText: text,
          uploadCoords: await this.sharedLocation(phone),
        })
      }
    }

    return UNKNOWN_COMMAND
  }

  private async handleImage(
    phone: string,
    imageData: string,
    mimeType: string,
    location: Coordinates | null
  ): Promise<string> {
    if (!this.ocr) {
      return '📸 Receipt photos cannot be read right now. Please send the receipt text instead.'
    }

    let extracted: OcrResult
    try {
      extracted = await this.ocr.extract(imageData, mimeType)
    } catch (error) {
      this.logger.error({ err: error, phone }, 'Receipt OCR failed')
      return '❌ We could not read that receipt. Please send a clearer photo.'
    }

    if (extracted.amount === null) {
      return '❌ Could not process receipt: no total found. Please send a clearer photo.'
    }

    return this.submit(phone, {
      customerPhone: phone,
      amount: extracted.amount,
      shopName: extracted.shopName,
      shopAddress: extracted.address,
      items: extracted.items,
      receiptText: extracted.rawText,
      uploadCoords: location ?? (await this.sharedLocation(phone)),
    })
  }

  /**
   * The customer's last shared location while it is still fresh
   */
  private async sharedLocation(phone: string): Promise<Coordinates | null> {
    if (this.locationMaxAgeMs <= 0) return null

    const customer = await this.query.findCustomer(phone)
    if (!customer?.lastLocation || !customer.lastLocationAt) return null

    const age = this.now().getTime() - customer.lastLocationAt.getTime()
    return age <= this.locationMaxAgeMs ? customer.lastLocation : null
  }

  private async submit(phone: string, submission: ReceiptSubmission): Promise<string> {
    let receipt: Receipt
    try {
      ({ receipt } = await this.ingestion.ingest(submission))
    } catch (error) {
      if (error instanceof AppError && error.statusCode < 500) {
        this.logger.info({ phone, error: error.message }, 'Receipt rejected at ingestion')
        return `❌ ${error.message}`
      }
      throw error
    }

    const lines = [
      '✅ Receipt received!',
      '',
      `🏪 Shop: ${receipt.shopName ?? 'Unknown'}`,
      `💰 Amount: ${money(receipt.amount, receipt.currency)}`,
      `📦 Items: ${receipt.items.length}`,
    ]
    if (receipt.uploadCoordinates) lines.push('📍 Location captured')
    lines.push('')
    lines.push(
      receipt.status === 'pending_review'
        ? '⏳ Your receipt is being reviewed before it can enter the draw.'
        : '🎰 You\'re entered in today\'s draw! Good luck!'
    )
    return lines.join('\n')
  }

  private async recentReceipts(phone: string): Promise<string> {
    const { items, total } = await this.query.receiptsByCustomer(phone, { limit: 5, offset: 0 })
    if (items.length === 0) {
      return '📋 No receipts yet. Send a receipt photo to get started!'
    }

    const lines = items.map((receipt, i) =>
      `${i + 1}. ${STATUS_ICONS[receipt.status]} ${receipt.shopName ?? 'Unknown'} - ${money(receipt.amount, receipt.currency)} (${toDateKey(receipt.submittedAt)})`
    )
    return [`📋 Your recent receipts (${total} total):`, '', ...lines].join('\n')
  }

  private async wins(phone: string): Promise<string> {
    const { wins, totalWon } = await this.query.winsByPhone(phone)
    if (wins.length === 0) {
      return '🏆 No wins yet. Keep uploading receipts for a chance to win!'
    }

    const lines = wins.slice(0, 5).map((draw) => `• ${draw.drawDate}: ${money(draw.prizeAmount)}`)
    return [`🏆 Your winnings: ${money(totalWon)}`, '', ...lines].join('\n')
  }

  private async balance(phone: string): Promise<string> {
    const customer = await this.query.findCustomer(phone)
    if (!customer) {
      return '📊 No activity yet. Send a receipt photo to get started!'
    }

    return [
      '📊 Your stats',
      '',
      `📋 Receipts: ${customer.totalReceipts}`,
      `💵 Total spent: ${money(customer.totalSpent)}`,
      `🏆 Wins: ${customer.totalWins}`,
      `💰 Won back: ${money(customer.totalWinnings)}`,
    ].join('\n')
  }

  private async drawStatus(phone: string): Promise<string> {
    const today = toDateKey(this.now())
    const draw = await this.query.findDraw(today)

    if (draw?.status === 'completed') {
      if (draw.winnerPhone === phone) {
        return `🎉 YOU WON TODAY! Prize: ${money(draw.prizeAmount)}`
      }
      return `📊 Today's draw is complete. The winner has been notified.\n🎟️ Total entries: ${draw.totalReceipts}`
    }

    const { total } = await this.query.listReceipts({ date: today }, { limit: 1, offset: 0 })
    return `🎰 Today's draw status\n🎟️ Entries so far: ${total}\n⏰ Draw time: ${this.drawTimeUtc} UTC`
  }
}
