import type { FastifyBaseLogger } from 'fastify'

/**
 * Outbound winner notification contract
 */
export interface WinnerNotifier {
  notifyWinner(phone: string, prizeAmount: number, drawDate: string): Promise<boolean>
}

/**
 * Posts winner notifications to the chat gateway service, which relays them
 * to the customer over the chat channel
 */
export class HttpWinnerNotifier implements WinnerNotifier {
  constructor(
    private readonly baseUrl: string,
    private readonly logger: FastifyBaseLogger,
    private readonly timeoutMs: number = 30_000
  ) {}

  async notifyWinner(phone: string, prizeAmount: number, drawDate: string): Promise<boolean> {
    const response = await fetch(new URL('/notify-winner', this.baseUrl), {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        phone_number: phone,
        prize_amount: prizeAmount,
        draw_date: drawDate,
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    })

    if (!response.ok) {
      this.logger.warn({ status: response.status, phone, drawDate }, 'Chat gateway rejected winner notification')
      return false
    }

    return true
  }
}

/**
 * Used when no chat gateway is configured: logs the winner and reports
 * that nobody was notified
 */
export class LogOnlyWinnerNotifier implements WinnerNotifier {
  constructor(private readonly logger: FastifyBaseLogger) {}

  async notifyWinner(phone: string, prizeAmount: number, drawDate: string): Promise<boolean> {
    this.logger.warn({ phone, prizeAmount, drawDate }, 'CHAT_SERVICE_URL not set, winner not notified')
    return false
  }
}
