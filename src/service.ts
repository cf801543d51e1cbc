/**
 * Reminder Service
 *
 * Ties the store, clock, sink and mirror together: event lifecycle, user and
 * department operations, and the two scheduled jobs (reminder dispatch and
 * the daily digest).
 */

import type { Adapter, Event, User } from './adapter'
import type { Clock } from './clock'
import { pollAndDispatch as runDispatchCycle } from './dispatch'
import type { DispatchReport } from './dispatch'
import { createDispatchLoop } from './dispatch-loop'
import type { DispatchLoop } from './dispatch-loop'
import { sendDailyDigest as runDigest } from './digest'
import { ValidationError } from './errors'
import type { EventMirror } from './event-mirror'
import * as events from './events'
import type { EventInput, EventUpdate, LifecycleDeps } from './events'
import type { Logger } from './logger'
import type { NotificationSink } from './notification-sink'
import * as users from './users'
import type { AccessPolicy, Statistics, UserInput } from './users'

export { ValidationError }

// ============================================================================
// Types
// ============================================================================

export type ReminderServiceConfig = {
  adapter: Adapter
  clock: Clock
  sink: NotificationSink
  logger: Logger
  mirror?: EventMirror
  access?: Partial<AccessPolicy>
  /** Default: every minute at second 0 */
  dispatchCron?: string
  /** Default: 08:00 every day. Null disables the digest job. */
  digestCron?: string | null
  receiptWriteAttempts?: number
  receiptRetryDelayMs?: number
}

export interface ReminderService {
  // Lifecycle
  createEvent(input: EventInput): Promise<Event>
  editEvent(eventId: number, update: EventUpdate, actorId?: number): Promise<Event>
  cancelEvent(eventId: number, actorId?: number): Promise<Event>
  getEvent(eventId: number): Promise<Event | null>
  getUpcomingEvents(): Promise<Event[]>
  getEventsOnDate(date: string): Promise<Event[]>
  getEventsByOwner(ownerId: number): Promise<Event[]>
  getEventsInRange(start: string, end: string): Promise<Event[]>

  // Users & departments
  registerUser(input: UserInput): Promise<User>
  getUser(userId: number): Promise<User | null>
  isRegistered(userId: number): Promise<boolean>
  isAdmin(userId: number): Promise<boolean>
  isAllowed(userId: number): boolean
  listDepartments(activeOnly?: boolean): Promise<string[]>
  addDepartment(name: string): Promise<void>
  removeDepartment(name: string): Promise<void>
  getStatistics(): Promise<Statistics>

  // Scheduled jobs
  /** One dispatch cycle; null when a cycle was already in flight. */
  pollAndDispatch(): Promise<DispatchReport | null>
  /** Posts the digest; null when skipped or failed. */
  sendDailyDigest(): Promise<number | null>
  start(): void
  stop(): Promise<void>
}

export const DEFAULT_DISPATCH_CRON = '0 * * * * *'
export const DEFAULT_DIGEST_CRON = '0 0 8 * * *'

// ============================================================================
// Factory
// ============================================================================

export function createReminderService(config: ReminderServiceConfig): ReminderService {
  const { adapter, clock, sink, logger } = config
  const policy: AccessPolicy = {
    adminUserIds: config.access?.adminUserIds ?? [],
    allowedUserIds: config.access?.allowedUserIds ?? [],
  }
  if (config.receiptWriteAttempts !== undefined && config.receiptWriteAttempts < 1) {
    throw new ValidationError('receiptWriteAttempts must be at least 1')
  }

  const lifecycle: LifecycleDeps = {
    adapter,
    clock,
    sink,
    logger: logger.child('events'),
    adminUserIds: policy.adminUserIds,
    ...(config.mirror ? { mirror: config.mirror } : {}),
  }

  const dispatchLogger = logger.child('dispatch')
  const dispatchLoop: DispatchLoop<DispatchReport> = createDispatchLoop({
    name: 'Reminder dispatch',
    cronTime: config.dispatchCron ?? DEFAULT_DISPATCH_CRON,
    timezone: clock.timezone,
    logger: dispatchLogger,
    runCycle: () =>
      runDispatchCycle({
        adapter,
        clock,
        sink,
        logger: dispatchLogger,
        ...(config.receiptWriteAttempts !== undefined ? { receiptWriteAttempts: config.receiptWriteAttempts } : {}),
        ...(config.receiptRetryDelayMs !== undefined ? { receiptRetryDelayMs: config.receiptRetryDelayMs } : {}),
      }),
  })

  const digestCron = config.digestCron === undefined ? DEFAULT_DIGEST_CRON : config.digestCron
  const digestLogger = logger.child('digest')
  const digestLoop: DispatchLoop<number> = createDispatchLoop({
    name: 'Daily digest',
    cronTime: digestCron ?? DEFAULT_DIGEST_CRON,
    timezone: clock.timezone,
    logger: digestLogger,
    runCycle: () => runDigest({ adapter, clock, sink, logger: digestLogger }),
  })

  return {
    // ---- Lifecycle ----
    createEvent: (input) => events.createEvent(lifecycle, input),
    editEvent: (eventId, update, actorId) => events.editEvent(lifecycle, eventId, update, actorId),
    cancelEvent: (eventId, actorId) => events.cancelEvent(lifecycle, eventId, actorId),
    getEvent: (eventId) => events.getEvent(adapter, eventId),
    getUpcomingEvents: () => events.getUpcomingEvents(adapter, clock),
    getEventsOnDate: (date) => events.getEventsOnDate(adapter, date),
    getEventsByOwner: (ownerId) => events.getEventsByOwner(adapter, ownerId),
    getEventsInRange: (start, end) => events.getEventsInRange(adapter, start, end),

    // ---- Users & departments ----
    registerUser: (input) => users.registerUser(adapter, clock, policy, input),
    getUser: (userId) => users.getUser(adapter, userId),
    isRegistered: (userId) => users.isRegistered(adapter, userId),
    isAdmin: (userId) => users.isAdmin(adapter, policy, userId),
    isAllowed: (userId) => users.isAllowed(policy, userId),
    listDepartments: (activeOnly) => users.listDepartments(adapter, activeOnly),
    addDepartment: (name) => users.addDepartment(adapter, name),
    removeDepartment: (name) => users.removeDepartment(adapter, name),
    getStatistics: () => users.getStatistics(adapter),

    // ---- Scheduled jobs ----
    async pollAndDispatch() {
      const outcome = await dispatchLoop.tick()
      return outcome.status === 'completed' ? outcome.result : null
    },

    async sendDailyDigest() {
      const outcome = await digestLoop.tick()
      return outcome.status === 'completed' ? outcome.result : null
    },

    start() {
      dispatchLoop.start()
      if (digestCron !== null) digestLoop.start()
    },

    async stop() {
      await Promise.all([dispatchLoop.stop(), digestLoop.stop()])
    },
  }
}
