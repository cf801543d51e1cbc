/**
 * Reminder Dispatch
 *
 * One dispatch cycle: find every (event, threshold) pair whose reminder window
 * is open and has no receipt, deliver them in order, and record a receipt for
 * each confirmed delivery. Receipts in the store are the only record of what
 * was sent; nothing is remembered between cycles.
 */

import type { Adapter, Event, User } from './adapter'
import type { Clock } from './clock'
import { DuplicateKeyError, StoreWriteFailureError, describeError } from './errors'
import { occursAt } from './events'
import type { Logger } from './logger'
import type { NotificationSink } from './notification-sink'
import { THRESHOLDS } from './thresholds'
import type { Threshold, ThresholdKind } from './thresholds'
import { addMinutes, dateOf, toLocal, toUTC } from './time-date'
import type { LocalDateTime } from './time-date'

export { StoreWriteFailureError }

// ============================================================================
// Types
// ============================================================================

export type ReminderKey = {
  eventId: number
  threshold: ThresholdKind
}

export type DueReminder = {
  event: Event
  threshold: Threshold
  occursAt: LocalDateTime
}

export type DispatchReport = {
  /** The single clock reading the cycle used */
  checkedAt: LocalDateTime
  delivered: ReminderKey[]
  /** Sink rejected; retried next cycle */
  failed: ReminderKey[]
  /** Delivered but the receipt could not be written */
  unrecorded: ReminderKey[]
  /** Event changed or was cancelled since listing; re-evaluated next cycle */
  skipped: ReminderKey[]
  /** Set when the cycle could not list events */
  error?: string
}

export type DispatchDeps = {
  adapter: Adapter
  clock: Clock
  sink: NotificationSink
  logger: Logger
  receiptWriteAttempts?: number
  receiptRetryDelayMs?: number
  sleep?: (ms: number) => Promise<void>
}

export const DEFAULT_RECEIPT_WRITE_ATTEMPTS = 3
export const DEFAULT_RECEIPT_RETRY_DELAY_MS = 200

// ============================================================================
// Window matching
// ============================================================================

/**
 * True when `nowUtc` lies in [occursAt - lead time, occursAt). `eventAt` is
 * wall time in `timezone`; `nowUtc` is the clock's instant in UTC, so a
 * repeated wall hour cannot make a started event look upcoming.
 */
export function isWindowOpen(
  eventAt: LocalDateTime,
  threshold: Threshold,
  nowUtc: LocalDateTime,
  timezone: string,
): boolean {
  const eventUtc = toUTC(eventAt, timezone)
  const opensAt = addMinutes(eventUtc, -threshold.minutesBefore)
  return opensAt <= nowUtc && nowUtc < eventUtc
}

/** Thresholds whose window is open for an event at `eventAt`. */
export function openThresholds(eventAt: LocalDateTime, nowUtc: LocalDateTime, timezone: string): Threshold[] {
  return THRESHOLDS.filter((t) => isWindowOpen(eventAt, t, nowUtc, timezone))
}

function compareDue(a: DueReminder, b: DueReminder): number {
  if (a.occursAt !== b.occursAt) return a.occursAt < b.occursAt ? -1 : 1
  if (a.threshold.minutesBefore !== b.threshold.minutesBefore) {
    return b.threshold.minutesBefore - a.threshold.minutesBefore
  }
  return a.event.id - b.event.id
}

/**
 * Pairs due at the instant `nowUtc`, in delivery order: soonest event first, then longest
 * lead time, then event id.
 */
export function findDueReminders(
  events: readonly Event[],
  sent: ReadonlyMap<number, ReadonlySet<ThresholdKind>>,
  nowUtc: LocalDateTime,
  timezone: string,
): DueReminder[] {
  const due: DueReminder[] = []
  for (const event of events) {
    if (event.cancelled) continue
    const at = occursAt(event)
    const receipts = sent.get(event.id)
    for (const threshold of openThresholds(at, nowUtc, timezone)) {
      if (receipts?.has(threshold.kind)) continue
      due.push({ event, threshold, occursAt: at })
    }
  }
  return due.sort(compareDue)
}

// ============================================================================
// Cycle
// ============================================================================

function keyOf(due: DueReminder): ReminderKey {
  return { eventId: due.event.id, threshold: due.threshold.kind }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Writes the receipt, retrying on failure. A receipt that already exists
 * counts as written.
 */
async function recordReceipt(deps: DispatchDeps, due: DueReminder, sentAt: LocalDateTime): Promise<boolean> {
  const attempts = Math.max(1, deps.receiptWriteAttempts ?? DEFAULT_RECEIPT_WRITE_ATTEMPTS)
  const delayMs = deps.receiptRetryDelayMs ?? DEFAULT_RECEIPT_RETRY_DELAY_MS
  const sleep = deps.sleep ?? defaultSleep

  let lastError: unknown
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      await deps.adapter.createReceipt({ eventId: due.event.id, threshold: due.threshold.kind, sentAt })
      return true
    } catch (error) {
      if (error instanceof DuplicateKeyError) return true
      lastError = error
      deps.logger.warn('Receipt write failed', {
        ...keyOf(due),
        attempt,
        attempts,
        error: describeError(error),
      })
      if (attempt < attempts && delayMs > 0) await sleep(delayMs)
    }
  }

  const failure = new StoreWriteFailureError(
    `Reminder ${due.threshold.kind} for event ${due.event.id} was sent but its receipt could not be written`,
    { cause: lastError },
  )
  deps.logger.error('Reminder sent but not recorded', {
    ...keyOf(due),
    attempts,
    error: describeError(failure),
    cause: describeError(lastError),
  })
  return false
}

async function loadReceipts(
  deps: DispatchDeps,
  events: readonly Event[],
  nowUtc: LocalDateTime,
): Promise<Map<number, Set<ThresholdKind>>> {
  const sent = new Map<number, Set<ThresholdKind>>()
  for (const event of events) {
    if (openThresholds(occursAt(event), nowUtc, deps.clock.timezone).length === 0) continue
    const receipts = await deps.adapter.getReceiptsByEvent(event.id)
    sent.set(event.id, new Set(receipts.map((r) => r.threshold)))
  }
  return sent
}

async function loadOwner(deps: DispatchDeps, event: Event): Promise<User | null> {
  try {
    return await deps.adapter.getUser(event.ownerId)
  } catch (error) {
    deps.logger.warn('Could not load event owner', { eventId: event.id, error: describeError(error) })
    return null
  }
}

/**
 * Runs one dispatch cycle. Never throws: listing failures are reported in
 * `error`, and a failing pair does not stop the pairs after it.
 */
export async function pollAndDispatch(deps: DispatchDeps): Promise<DispatchReport> {
  const { adapter, clock, sink, logger } = deps
  const instant = clock.nowUtc()
  const now = toLocal(instant, clock.timezone)
  const report: DispatchReport = { checkedAt: now, delivered: [], failed: [], unrecorded: [], skipped: [] }

  let due: DueReminder[]
  try {
    const events = await adapter.listActiveEvents(dateOf(now))
    const sent = await loadReceipts(deps, events, instant)
    due = findDueReminders(events, sent, instant, clock.timezone)
  } catch (error) {
    report.error = describeError(error)
    logger.error('Dispatch cycle could not list events', { checkedAt: now, error: report.error })
    return report
  }

  for (const item of due) {
    const key = keyOf(item)

    let current: Event | null
    try {
      current = await adapter.getEvent(item.event.id)
    } catch (error) {
      logger.warn('Could not re-read event before delivery', { ...key, error: describeError(error) })
      report.skipped.push(key)
      continue
    }
    if (!current || current.cancelled || occursAt(current) !== item.occursAt) {
      logger.debug('Event changed since listing, skipping', key)
      report.skipped.push(key)
      continue
    }

    const owner = await loadOwner(deps, current)
    try {
      await sink.deliverReminder({ event: current, threshold: item.threshold, owner })
    } catch (error) {
      logger.warn('Reminder delivery failed, will retry next cycle', { ...key, error: describeError(error) })
      report.failed.push(key)
      continue
    }

    if (await recordReceipt(deps, item, now)) {
      logger.info('Reminder sent', { ...key, occursAt: item.occursAt })
      report.delivered.push(key)
    } else {
      report.unrecorded.push(key)
    }
  }

  if (due.length > 0) {
    logger.info('Dispatch cycle finished', {
      checkedAt: now,
      delivered: report.delivered.length,
      failed: report.failed.length,
      unrecorded: report.unrecorded.length,
      skipped: report.skipped.length,
    })
  }
  return report
}
