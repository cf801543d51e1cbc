/**
 * Event Lifecycle
 *
 * Create, edit and cancel events, plus the read queries the chat menus use.
 * Writes run inside an adapter transaction; announcements to the media chat
 * and the mirror run after commit and never fail the operation.
 */

import type { Adapter, Event, EventChanges, User } from './adapter'
import type { Clock } from './clock'
import { ForbiddenError, NotFoundError, ValidationError, describeError } from './errors'
import type { EventMirror } from './event-mirror'
import type { Logger } from './logger'
import type { EventNotice, NotificationSink } from './notification-sink'
import {
  dateOf,
  makeDateTime,
  parseDate,
  parseDisplayDate,
  parseTime,
} from './time-date'
import type { LocalDate, LocalDateTime, LocalTime } from './time-date'

export { ForbiddenError, NotFoundError, ValidationError }

// ============================================================================
// Types
// ============================================================================

export type EventInput = {
  title: string
  /** YYYY-MM-DD or DD.MM.YYYY */
  date: string
  /** HH:MM, 24-hour */
  time: string
  place: string
  comment?: string | null
  ownerId: number
}

export type EventUpdate = {
  title?: string
  date?: string
  time?: string
  place?: string
  comment?: string | null
}

export type LifecycleDeps = {
  adapter: Adapter
  clock: Clock
  logger: Logger
  sink?: NotificationSink
  mirror?: EventMirror
  /** Users allowed to edit and cancel any event */
  adminUserIds?: readonly number[]
}

export const MIN_TITLE_LENGTH = 3
export const MIN_PLACE_LENGTH = 2

// ============================================================================
// Derived values
// ============================================================================

/** The wall-clock instant the event starts, in the configured timezone. */
export function occursAt(event: Pick<Event, 'date' | 'time'>): LocalDateTime {
  return makeDateTime(event.date, event.time)
}

// ============================================================================
// Validation
// ============================================================================

function validateTitle(title: string): string {
  const trimmed = title.trim()
  if (trimmed.length < MIN_TITLE_LENGTH) {
    throw new ValidationError(`Title must be at least ${MIN_TITLE_LENGTH} characters`)
  }
  return trimmed
}

function validatePlace(place: string): string {
  const trimmed = place.trim()
  if (trimmed.length < MIN_PLACE_LENGTH) {
    throw new ValidationError(`Place must be at least ${MIN_PLACE_LENGTH} characters`)
  }
  return trimmed
}

export function normalizeDate(input: string): LocalDate {
  const trimmed = input.trim()
  const result = trimmed.includes('.') ? parseDisplayDate(trimmed) : parseDate(trimmed)
  if (!result.ok) throw new ValidationError(result.error.message)
  return result.value
}

export function normalizeTime(input: string): LocalTime {
  const trimmed = input.trim()
  if (!/^\d{2}:\d{2}$/.test(trimmed)) {
    throw new ValidationError(`Invalid time format: '${input}' (expected HH:MM)`)
  }
  const result = parseTime(trimmed)
  if (!result.ok) throw new ValidationError(result.error.message)
  return result.value
}

function normalizeComment(comment: string | null | undefined): string | null {
  const trimmed = comment?.trim() ?? ''
  return trimmed === '' ? null : trimmed
}

function requireNotPast(date: LocalDate, clock: Clock): void {
  const today = dateOf(clock.now())
  if (date < today) {
    throw new ValidationError(`Event date ${date} is in the past`)
  }
}

function authorize(deps: LifecycleDeps, event: Event, actorId: number | undefined): void {
  if (actorId === undefined) return
  if (actorId === event.ownerId) return
  if (deps.adminUserIds?.includes(actorId)) return
  throw new ForbiddenError(`User '${actorId}' may not change event '${event.id}'`)
}

// ============================================================================
// Side effects after commit
// ============================================================================

async function announce(deps: LifecycleDeps, notice: EventNotice): Promise<void> {
  if (!deps.sink) return
  try {
    await deps.sink.deliverNotice(notice)
  } catch (error) {
    deps.logger.warn(`Could not announce ${notice.kind} event`, {
      eventId: notice.event.id,
      error: describeError(error),
    })
  }
}

async function mirror(
  deps: LifecycleDeps,
  event: Event,
  run: (mirror: EventMirror) => Promise<void>,
): Promise<void> {
  if (!deps.mirror) return
  try {
    await run(deps.mirror)
  } catch (error) {
    deps.logger.warn('Event mirror update failed', { eventId: event.id, error: describeError(error) })
  }
}

async function ownerOf(adapter: Adapter, event: Event): Promise<User | null> {
  return adapter.getUser(event.ownerId)
}

// ============================================================================
// Operations
// ============================================================================

export async function createEvent(deps: LifecycleDeps, input: EventInput): Promise<Event> {
  const { adapter, clock, logger } = deps
  const title = validateTitle(input.title)
  const place = validatePlace(input.place)
  const date = normalizeDate(input.date)
  const time = normalizeTime(input.time)
  requireNotPast(date, clock)

  const now = clock.now()
  const event = await adapter.transaction(async () => {
    const owner = await adapter.getUser(input.ownerId)
    if (!owner) throw new ValidationError(`User '${input.ownerId}' is not registered`)
    const id = await adapter.createEvent({
      title,
      date,
      time,
      place,
      comment: normalizeComment(input.comment),
      ownerId: input.ownerId,
      cancelled: false,
      createdAt: now,
      updatedAt: now,
    })
    const created = await adapter.getEvent(id)
    if (!created) throw new NotFoundError(`Event '${id}' not found after insert`)
    return created
  })

  logger.info('Event created', { eventId: event.id, occursAt: occursAt(event), ownerId: event.ownerId })
  const owner = await ownerOf(adapter, event)
  await announce(deps, { kind: 'created', event, owner })
  await mirror(deps, event, (m) => m.eventCreated(event, owner))
  return event
}

export async function editEvent(
  deps: LifecycleDeps,
  eventId: number,
  update: EventUpdate,
  actorId?: number,
): Promise<Event> {
  const { adapter, clock, logger } = deps

  const changes: EventChanges = {}
  if (update.title !== undefined) changes.title = validateTitle(update.title)
  if (update.place !== undefined) changes.place = validatePlace(update.place)
  if (update.date !== undefined) {
    changes.date = normalizeDate(update.date)
    requireNotPast(changes.date, clock)
  }
  if (update.time !== undefined) changes.time = normalizeTime(update.time)
  if (update.comment !== undefined) changes.comment = normalizeComment(update.comment)
  if (Object.keys(changes).length === 0) {
    throw new ValidationError('No changes given')
  }

  const { before, after } = await adapter.transaction(async () => {
    const existing = await adapter.getEvent(eventId)
    if (!existing || existing.cancelled) throw new NotFoundError(`Event '${eventId}' not found`)
    authorize(deps, existing, actorId)
    await adapter.updateEvent(eventId, { ...changes, updatedAt: clock.now() })
    const updated = await adapter.getEvent(eventId)
    if (!updated) throw new NotFoundError(`Event '${eventId}' not found`)
    return { before: existing, after: updated }
  })

  const changedFields = (['title', 'date', 'time', 'place', 'comment'] as const).filter(
    (field) => before[field] !== after[field],
  )
  logger.info('Event updated', { eventId, changedFields, occursAt: occursAt(after) })

  const owner = await ownerOf(adapter, after)
  await announce(deps, { kind: 'updated', event: after, owner, changedFields })
  await mirror(deps, after, (m) => m.eventUpdated(after, owner))
  return after
}

export async function cancelEvent(deps: LifecycleDeps, eventId: number, actorId?: number): Promise<Event> {
  const { adapter, clock, logger } = deps

  const cancelled = await adapter.transaction(async () => {
    const existing = await adapter.getEvent(eventId)
    if (!existing || existing.cancelled) throw new NotFoundError(`Event '${eventId}' not found`)
    authorize(deps, existing, actorId)
    const updatedAt = clock.now()
    await adapter.updateEvent(eventId, { cancelled: true, updatedAt })
    return { ...existing, cancelled: true, updatedAt }
  })

  logger.info('Event cancelled', { eventId })
  const owner = await ownerOf(adapter, cancelled)
  await announce(deps, { kind: 'cancelled', event: cancelled, owner })
  await mirror(deps, cancelled, (m) => m.eventCancelled(cancelled))
  return cancelled
}

// ============================================================================
// Queries
// ============================================================================

export async function getEvent(adapter: Adapter, eventId: number): Promise<Event | null> {
  return adapter.getEvent(eventId)
}

/** Non-cancelled events that have not started yet, soonest first. */
export async function getUpcomingEvents(adapter: Adapter, clock: Clock): Promise<Event[]> {
  const now = clock.now()
  const events = await adapter.listActiveEvents(dateOf(now))
  return events.filter((e) => occursAt(e) > now)
}

export async function getEventsOnDate(adapter: Adapter, date: string): Promise<Event[]> {
  return adapter.getEventsByDate(normalizeDate(date))
}

export async function getEventsByOwner(adapter: Adapter, ownerId: number): Promise<Event[]> {
  return adapter.getEventsByOwner(ownerId)
}

export async function getEventsInRange(adapter: Adapter, start: string, end: string): Promise<Event[]> {
  const from = normalizeDate(start)
  const to = normalizeDate(end)
  if (from > to) throw new ValidationError(`Range start ${from} is after end ${to}`)
  return adapter.getEventsInRange(from, to)
}
