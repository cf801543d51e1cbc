/**
 * Daily Digest
 *
 * Morning summary of the day's events for the media chat.
 */

import type { Adapter, User } from './adapter'
import type { Clock } from './clock'
import type { Logger } from './logger'
import type { NotificationSink } from './notification-sink'
import { dateOf } from './time-date'

export type DigestDeps = {
  adapter: Adapter
  clock: Clock
  sink: NotificationSink
  logger: Logger
}

/**
 * Posts today's non-cancelled events in time order and returns how many were
 * listed. Delivery errors propagate to the caller.
 */
export async function sendDailyDigest(deps: DigestDeps): Promise<number> {
  const { adapter, clock, sink, logger } = deps
  const today = dateOf(clock.now())
  const events = await adapter.getEventsByDate(today)

  const owners = new Map<number, User | null>()
  for (const event of events) {
    if (!owners.has(event.ownerId)) owners.set(event.ownerId, await adapter.getUser(event.ownerId))
  }

  await sink.deliverNotice({
    kind: 'digest',
    date: today,
    events: events.map((event) => ({ event, owner: owners.get(event.ownerId) ?? null })),
  })
  logger.info('Daily digest sent', { date: today, events: events.length })
  return events.length
}
