import type { ReceiptItem } from '../types'
import { roundMoney } from '../utils/validation'

export interface ParsedReceipt {
  shopName: string | null
  address: string | null
  amount: number | null
  items: ReceiptItem[]
  /** Date as printed on the receipt, not normalized */
  date: string | null
}

const TOTAL_PATTERNS = [
  /(?:GRAND\s*TOTAL|TOTAL|AMOUNT\s*DUE|BALANCE\s*DUE|AMOUNT)[:\s]*(?:R|\$)?\s*(\d+[.,]\d{2})/i,
  /(?:R|\$)\s*(\d+[.,]\d{2})\s*$/i,
  /(\d+[.,]\d{2})\s*(?:ZAR|RAND|USD|EUR|GBP)?$/i,
]

const ITEM_PATTERN = /^(.+?)\s+(?:R|\$)?\s*(\d+[.,]\d{2})$/

const NOT_AN_ITEM = ['total', 'subtotal', 'vat', 'tax', 'cash', 'change', 'card', 'balance', 'amount']

const DATE_PATTERNS = [
  /(\d{4}[/-]\d{1,2}[/-]\d{1,2})/,
  /(\d{1,2}[/-]\d{1,2}[/-]\d{2,4})/,
  /(\d{1,2}\s+(?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)[a-z]*\s+\d{2,4})/i,
]

const ADDRESS_KEYWORDS = ['street', 'st.', 'road', 'rd.', 'ave', 'avenue', 'blvd', 'mall', 'centre', 'center', 'suite', 'floor']

function parsePrice(value: string): number {
  return roundMoney(Number(value.replace(',', '.')))
}

/**
 * Best-effort extraction from plain receipt text.
 * The shop is the first non-empty line; the total is the last line matching
 * a total pattern, scanning from the bottom.
 */
export function parseReceiptText(text: string): ParsedReceipt {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)

  const result: ParsedReceipt = { shopName: null, address: null, amount: null, items: [], date: null }
  if (lines.length === 0) return result

  result.shopName = lines[0]

  for (const line of lines.slice(1, 6)) {
    const lower = line.toLowerCase()
    if (ADDRESS_KEYWORDS.some((keyword) => lower.includes(keyword))) {
      result.address = line
      break
    }
  }

  totals: for (const line of [...lines].reverse()) {
    for (const pattern of TOTAL_PATTERNS) {
      const match = pattern.exec(line)
      if (!match) continue

      const amount = parsePrice(match[1])
      if (amount > 0) {
        result.amount = amount
        break totals
      }
    }
  }

  for (const line of lines.slice(1)) {
    const lower = line.toLowerCase()
    if (NOT_AN_ITEM.some((keyword) => lower.includes(keyword))) continue

    const match = ITEM_PATTERN.exec(line)
    if (!match) continue

    const name = match[1].trim()
    const price = parsePrice(match[2])
    if (price > 0 && name.length > 1) {
      result.items.push({ name, price })
    }
  }

  for (const line of lines) {
    const match = DATE_PATTERNS.map((pattern) => pattern.exec(line)).find((m) => m !== null)
    if (match) {
      result.date = match[1]
      break
    }
  }

  return result
}
