import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest'
import { DrawService } from '../../src/services/draw'
import { FraudClassifier } from '../../src/services/fraud'
import { ReceiptIngestionService } from '../../src/services/ingestion'
import type { WinnerNotifier } from '../../src/services/notifier'
import { AppError } from '../../src/utils/errors'
import { MemoryStore } from '../utils/memory-store'
import { silentLogger } from '../utils/logger'
import { addReceipt } from '../utils/seed'
import { at, testClock } from '../utils/fixtures'

const DAY = '2026-03-14'

describe('DrawService', () => {
  let store: MemoryStore
  let notifyWinner: Mock<WinnerNotifier['notifyWinner']>
  let notifier: WinnerNotifier
  let clock: ReturnType<typeof testClock>

  function createService(randomIndex: (size: number) => number = (size) => size - 1) {
    return new DrawService(store, notifier, silentLogger, {
      now: clock.now,
      randomIndex,
      claimTimeoutMs: 10 * 60 * 1000,
    })
  }

  beforeEach(() => {
    store = new MemoryStore()
    notifyWinner = vi.fn<WinnerNotifier['notifyWinner']>().mockResolvedValue(true)
    notifier = { notifyWinner }
    clock = testClock(at(23, 59))
  })

  it('closes a day without eligible receipts as no_entries', async () => {
    const result = await createService().runDraw(DAY)

    expect(result.draw).toMatchObject({ drawDate: DAY, status: 'no_entries', totalReceipts: 0, winnerPhone: null })
    expect(result.winner).toBeNull()
    expect(notifyWinner).not.toHaveBeenCalled()
  })

  it('draws only processed valid and review receipts of the day', async () => {
    await addReceipt(store, { phone: '0821110001', amount: 100, submittedAt: at(9), category: 'valid' })
    const review = await addReceipt(store, { phone: '0821110002', amount: 50.25, submittedAt: at(11), category: 'review' })
    await addReceipt(store, { phone: '0821110003', amount: 70, submittedAt: at(12), category: 'suspicious' })
    await addReceipt(store, { phone: '0821110004', amount: 90, submittedAt: at(13), category: 'flagged', status: 'pending_review' })
    await addReceipt(store, { phone: '0821110005', amount: 60, submittedAt: at(8, 0, '2026-03-13') })
    await addReceipt(store, { phone: '0821110006', amount: 65, submittedAt: at(14), status: 'rejected' })

    const randomIndex = vi.fn((size: number) => size - 1)
    const service = createService(randomIndex)
    const result = await service.runDraw(DAY)

    expect(randomIndex).toHaveBeenCalledWith(2)
    expect(result.draw).toMatchObject({
      status: 'completed',
      totalReceipts: 2,
      totalAmount: 150.25,
      winnerReceiptId: review.id,
      winnerPhone: '0821110002',
      prizeAmount: 50.25,
    })
    expect(result.winner).toMatchObject({ id: review.id, status: 'won' })
    expect(result.alreadyCompleted).toBe(false)

    expect((await store.receipts.findById(review.id))?.status).toBe('won')
    expect(await store.customers.findByPhone('0821110002')).toMatchObject({ totalWins: 1, totalWinnings: 50.25 })
    expect(notifyWinner).toHaveBeenCalledWith('0821110002', 50.25, DAY)
    await service.settled()
    expect((await store.draws.findByDate(DAY))?.winnerNotified).toBe(true)
  })

  it('draws one of a customer\'s same-day receipts end to end', async () => {
    const ingestion = new ReceiptIngestionService(store, new FraudClassifier(), silentLogger, { now: clock.now })
    for (const [hour, amount] of [[9, 100], [12, 50], [17, 25]]) {
      clock.set(at(hour))
      await ingestion.ingest({ customerPhone: '+15550001', amount })
    }
    clock.set(at(23, 59))

    const result = await new DrawService(store, notifier, silentLogger, { now: clock.now }).runDraw(DAY)

    expect(result.draw).toMatchObject({ status: 'completed', winnerPhone: '+15550001', totalReceipts: 3, totalAmount: 175 })
    expect([100, 50, 25]).toContain(result.draw.prizeAmount)
    expect(result.winner?.amount).toBe(result.draw.prizeAmount)
    expect(await store.customers.findByPhone('+15550001')).toMatchObject({
      totalReceipts: 3,
      totalSpent: 175,
      totalWins: 1,
      totalWinnings: result.draw.prizeAmount,
    })
  })

  it('includes the first and last instant of the UTC day', async () => {
    await addReceipt(store, { phone: '0821110001', amount: 10, submittedAt: new Date('2026-03-14T00:00:00.000Z') })
    await addReceipt(store, { phone: '0821110002', amount: 20, submittedAt: new Date('2026-03-14T23:59:59.999Z') })
    await addReceipt(store, { phone: '0821110003', amount: 30, submittedAt: new Date('2026-03-15T00:00:00.000Z') })

    const result = await createService().runDraw(DAY)

    expect(result.draw).toMatchObject({ totalReceipts: 2, totalAmount: 30 })
  })

  it('returns a completed draw unchanged', async () => {
    await addReceipt(store, { phone: '0821110001', amount: 100, submittedAt: at(9) })
    await addReceipt(store, { phone: '0821110002', amount: 40, submittedAt: at(10) })
    const service = createService()

    const first = await service.runDraw(DAY)
    await addReceipt(store, { phone: '0821110003', amount: 500, submittedAt: at(11) })
    const second = await service.runDraw(DAY)

    expect(second.alreadyCompleted).toBe(true)
    expect(second.draw).toEqual(first.draw)
    expect(second.winner?.id).toBe(first.winner?.id)
    expect(notifyWinner).toHaveBeenCalledTimes(1)
    expect(await store.customers.findByPhone('0821110002')).toMatchObject({ totalWins: 1 })
  })

  it('shares one run between concurrent calls', async () => {
    await addReceipt(store, { phone: '0821110001', amount: 100, submittedAt: at(9) })
    const service = createService()

    const [a, b] = await Promise.all([service.runDraw(DAY), service.runDraw(DAY)])

    expect(a.draw.id).toBe(b.draw.id)
    expect(notifyWinner).toHaveBeenCalledTimes(1)
  })

  it('completes a date once across competing instances', async () => {
    await addReceipt(store, { phone: '0821110001', amount: 100, submittedAt: at(9) })
    await addReceipt(store, { phone: '0821110002', amount: 40, submittedAt: at(10) })

    const results = await Promise.all([createService().runDraw(DAY), createService().runDraw(DAY)])

    const won = [...store.state.receipts.values()].filter((receipt) => receipt.status === 'won')
    expect(won).toHaveLength(1)
    expect(notifyWinner).toHaveBeenCalledTimes(1)
    expect((await store.draws.findByDate(DAY))?.status).toBe('completed')
    expect(results.filter((result) => result.draw.status === 'no_entries')).toHaveLength(0)
    expect(await store.customers.findByPhone(won[0].customerPhone)).toMatchObject({ totalWins: 1 })
  })

  it('draws a no_entries date again once receipts exist', async () => {
    const service = createService()
    await service.runDraw(DAY)

    await addReceipt(store, { phone: '0821110001', amount: 25, submittedAt: at(20) })
    const result = await service.runDraw(DAY)

    expect(result.draw).toMatchObject({ status: 'completed', winnerPhone: '0821110001', prizeAmount: 25 })
  })

  it('picks again when the chosen receipt leaves the pool', async () => {
    const first = await addReceipt(store, { phone: '0821110001', amount: 10, submittedAt: at(9) })
    const second = await addReceipt(store, { phone: '0821110002', amount: 20, submittedAt: at(10) })
    vi.spyOn(store.receipts, 'markWon').mockResolvedValueOnce(false)

    const result = await createService(() => 0).runDraw(DAY)

    expect(result.draw).toMatchObject({ status: 'completed', winnerReceiptId: second.id, totalReceipts: 2 })
    expect((await store.receipts.findById(first.id))?.status).toBe('processed')
  })

  it('keeps the draw when notification fails', async () => {
    await addReceipt(store, { phone: '0821110001', amount: 10, submittedAt: at(9) })
    notifyWinner.mockRejectedValueOnce(new Error('gateway down'))
    const service = createService()

    const result = await service.runDraw(DAY)
    await service.settled()

    expect(result.draw).toMatchObject({ status: 'completed', winnerNotified: false })
    expect(await store.draws.findByDate(DAY)).toMatchObject({ status: 'completed', winnerNotified: false })
  })

  it('records an undelivered notification', async () => {
    await addReceipt(store, { phone: '0821110001', amount: 10, submittedAt: at(9) })
    notifyWinner.mockResolvedValueOnce(false)
    const setWinnerNotified = vi.spyOn(store.draws, 'setWinnerNotified')
    const service = createService()

    await service.runDraw(DAY)
    await service.settled()

    expect(setWinnerNotified).toHaveBeenCalledWith(DAY, false)
    expect((await store.draws.findByDate(DAY))?.winnerNotified).toBe(false)
  })

  it('returns without waiting for the notifier', async () => {
    await addReceipt(store, { phone: '0821110001', amount: 10, submittedAt: at(9) })
    let deliver: (delivered: boolean) => void = () => undefined
    notifyWinner.mockImplementationOnce(() => new Promise<boolean>((resolve) => {
      deliver = resolve
    }))
    const service = createService()

    const result = await service.runDraw(DAY)

    expect(result.draw).toMatchObject({ status: 'completed', winnerNotified: false })
    expect((await store.draws.findByDate(DAY))?.winnerNotified).toBe(false)

    deliver(true)
    await service.settled()
    expect((await store.draws.findByDate(DAY))?.winnerNotified).toBe(true)
  })

  it('takes over a stale claim', async () => {
    await addReceipt(store, { phone: '0821110001', amount: 10, submittedAt: at(9) })
    await store.draws.claim(DAY, 'crashed-run', at(0, 5), at(0, 0))

    const result = await createService().runDraw(DAY)

    expect(result.draw).toMatchObject({ status: 'completed', winnerPhone: '0821110001' })
  })

  it('leaves a fresh claim to its owner', async () => {
    await addReceipt(store, { phone: '0821110001', amount: 10, submittedAt: at(9) })
    await store.draws.claim(DAY, 'other-run', at(23, 55), at(0, 0))

    const result = await createService().runDraw(DAY)

    expect(result).toMatchObject({ alreadyCompleted: false, winner: null, draw: { status: 'pending', claimId: 'other-run' } })
    expect(notifyWinner).not.toHaveBeenCalled()
  })

  it('defaults to the current UTC date', async () => {
    const result = await createService().runDraw()

    expect(result.draw.drawDate).toBe(DAY)
  })

  it('rejects a malformed date', async () => {
    await expect(createService().runDraw('2026-02-30')).rejects.toBeInstanceOf(AppError)
    await expect(createService().runDraw('yesterday')).rejects.toMatchObject({ statusCode: 400 })
  })

  it('uses a uniform pick by default', async () => {
    for (let i = 0; i < 5; i++) {
      await addReceipt(store, { phone: `082111000${i}`, amount: 10 + i, submittedAt: at(9 + i) })
    }
    const service = new DrawService(store, notifier, silentLogger, { now: clock.now })

    const result = await service.runDraw(DAY)

    expect(result.draw.status).toBe('completed')
    expect(result.draw.totalReceipts).toBe(5)
  })
})
