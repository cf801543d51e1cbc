/**
 * Adapter
 *
 * Persistence interface for events, users, departments and reminder receipts,
 * plus the in-memory implementation used by tests and local runs.
 * All methods are async so the SQLite adapter and any future remote store fit
 * behind the same interface.
 */

import { AsyncLocalStorage } from 'node:async_hooks'
import { DuplicateKeyError, ForeignKeyError, NotFoundError } from './errors'
import type { ThresholdKind } from './thresholds'
import type { LocalDate, LocalDateTime, LocalTime } from './time-date'

export type { LocalDate, LocalDateTime, LocalTime } from './time-date'
export { DuplicateKeyError, ForeignKeyError, InvalidDataError, NotFoundError } from './errors'

// ============================================================================
// Entity Types
// ============================================================================

export type User = {
  /** Chat platform user id */
  id: number
  fullName: string
  department: string
  phone: string
  isAdmin: boolean
  createdAt: LocalDateTime
}

export type Department = {
  name: string
  active: boolean
}

export type Event = {
  id: number
  title: string
  date: LocalDate
  time: LocalTime
  place: string
  comment: string | null
  ownerId: number
  cancelled: boolean
  createdAt: LocalDateTime
  updatedAt: LocalDateTime
}

export type NewEvent = Omit<Event, 'id'>

export type EventChanges = Partial<
  Pick<Event, 'title' | 'date' | 'time' | 'place' | 'comment' | 'cancelled' | 'updatedAt'>
>

export type ReminderReceipt = {
  eventId: number
  threshold: ThresholdKind
  sentAt: LocalDateTime
}

export type DepartmentCount = {
  department: string
  count: number
}

// ============================================================================
// Adapter Interface
// ============================================================================

export interface Adapter {
  /** Runs `fn` atomically; a throw rolls back every write made inside it. */
  transaction<T>(fn: () => Promise<T>): Promise<T>

  // User
  createUser(user: User): Promise<void>
  getUser(id: number): Promise<User | null>
  getAllUsers(): Promise<User[]>

  // Department
  createDepartment(name: string): Promise<void>
  getDepartments(activeOnly: boolean): Promise<Department[]>
  setDepartmentActive(name: string, active: boolean): Promise<void>

  // Event
  /** Persists the event and returns its assigned id. */
  createEvent(event: NewEvent): Promise<number>
  getEvent(id: number): Promise<Event | null>
  updateEvent(id: number, changes: EventChanges): Promise<void>
  /** Non-cancelled events dated on or after `fromDate`, in occurrence order. */
  listActiveEvents(fromDate: LocalDate): Promise<Event[]>
  getEventsByDate(date: LocalDate): Promise<Event[]>
  getEventsByOwner(ownerId: number): Promise<Event[]>
  getEventsInRange(start: LocalDate, end: LocalDate): Promise<Event[]>
  countEvents(): Promise<number>
  countEventsByDepartment(): Promise<DepartmentCount[]>

  // Reminder receipt
  createReceipt(receipt: ReminderReceipt): Promise<void>
  getReceiptsByEvent(eventId: number): Promise<ReminderReceipt[]>
  getAllReceipts(): Promise<ReminderReceipt[]>

  close(): Promise<void>
}

export type MockAdapterOptions = {
  /** Department names present from the start */
  departments?: readonly string[]
}

// ============================================================================
// Ordering
// ============================================================================

/** Occurrence order: date, then time, then id. */
export function compareEvents(a: Event, b: Event): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1
  if (a.time !== b.time) return a.time < b.time ? -1 : 1
  return a.id - b.id
}

export function compareDepartmentCounts(a: DepartmentCount, b: DepartmentCount): number {
  if (a.count !== b.count) return b.count - a.count
  return a.department < b.department ? -1 : a.department > b.department ? 1 : 0
}

// ============================================================================
// Mock Adapter
// ============================================================================

export function createMockAdapter(options: MockAdapterOptions = {}): Adapter {
  // ---- State ----
  const state = {
    users: new Map<number, User>(),
    departments: new Map<string, Department>(),
    events: new Map<number, Event>(),
    receipts: new Map<string, ReminderReceipt>(),
  }
  let nextEventId = 1

  for (const name of options.departments ?? []) {
    state.departments.set(name, { name, active: true })
  }

  // ---- Transaction ----
  // Each transaction carries its own undo log through async context, so a
  // rollback reverts only the writes made by that transaction's callback.
  const txContext = new AsyncLocalStorage<Array<() => void>>()

  function onRollback(undo: () => void) {
    txContext.getStore()?.push(undo)
  }

  // ---- Helpers ----
  function clone<T>(obj: T): T {
    return structuredClone(obj)
  }

  function receiptKey(eventId: number, threshold: ThresholdKind): string {
    return `${eventId}:${threshold}`
  }

  function activeEvents(): Event[] {
    return [...state.events.values()].filter((e) => !e.cancelled)
  }

  function sorted(events: Event[]): Event[] {
    return events.sort(compareEvents).map(clone)
  }

  const adapter: Adapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      if (txContext.getStore()) return fn()
      const undoLog: Array<() => void> = []
      try {
        return await txContext.run(undoLog, fn)
      } catch (e) {
        for (const undo of undoLog.reverse()) undo()
        throw e
      }
    },

    // ================================================================
    // User
    // ================================================================
    async createUser(user) {
      if (state.users.has(user.id)) {
        throw new DuplicateKeyError(`User '${user.id}' already exists`)
      }
      state.users.set(user.id, clone(user))
      onRollback(() => state.users.delete(user.id))
    },

    async getUser(id) {
      const u = state.users.get(id)
      return u ? clone(u) : null
    },

    async getAllUsers() {
      return [...state.users.values()].sort((a, b) => a.id - b.id).map(clone)
    },

    // ================================================================
    // Department
    // ================================================================
    async createDepartment(name) {
      if (state.departments.has(name)) {
        throw new DuplicateKeyError(`Department '${name}' already exists`)
      }
      state.departments.set(name, { name, active: true })
      onRollback(() => state.departments.delete(name))
    },

    async getDepartments(activeOnly) {
      return [...state.departments.values()]
        .filter((d) => !activeOnly || d.active)
        .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
        .map(clone)
    },

    async setDepartmentActive(name, active) {
      const existing = state.departments.get(name)
      if (!existing) throw new NotFoundError(`Department '${name}' not found`)
      state.departments.set(name, { ...existing, active })
      onRollback(() => state.departments.set(name, existing))
    },

    // ================================================================
    // Event
    // ================================================================
    async createEvent(event) {
      if (!state.users.has(event.ownerId)) {
        throw new ForeignKeyError(`User '${event.ownerId}' not found`)
      }
      const id = nextEventId++
      state.events.set(id, { ...clone(event), id })
      onRollback(() => state.events.delete(id))
      return id
    },

    async getEvent(id) {
      const e = state.events.get(id)
      return e ? clone(e) : null
    },

    async updateEvent(id, changes) {
      const existing = state.events.get(id)
      if (!existing) throw new NotFoundError(`Event '${id}' not found`)
      state.events.set(id, { ...existing, ...clone(changes), id })
      onRollback(() => state.events.set(id, existing))
    },

    async listActiveEvents(fromDate) {
      return sorted(activeEvents().filter((e) => e.date >= fromDate))
    },

    async getEventsByDate(date) {
      return sorted(activeEvents().filter((e) => e.date === date))
    },

    async getEventsByOwner(ownerId) {
      return sorted(activeEvents().filter((e) => e.ownerId === ownerId))
    },

    async getEventsInRange(start, end) {
      return sorted(activeEvents().filter((e) => e.date >= start && e.date <= end))
    },

    async countEvents() {
      return activeEvents().length
    },

    async countEventsByDepartment() {
      const counts = new Map<string, number>()
      for (const event of activeEvents()) {
        const owner = state.users.get(event.ownerId)
        if (!owner) continue
        counts.set(owner.department, (counts.get(owner.department) ?? 0) + 1)
      }
      return [...counts]
        .map(([department, count]) => ({ department, count }))
        .sort(compareDepartmentCounts)
    },

    // ================================================================
    // Reminder Receipt
    // ================================================================
    async createReceipt(receipt) {
      if (!state.events.has(receipt.eventId)) {
        throw new ForeignKeyError(`Event '${receipt.eventId}' not found`)
      }
      const key = receiptKey(receipt.eventId, receipt.threshold)
      if (state.receipts.has(key)) {
        throw new DuplicateKeyError(
          `Receipt for event '${receipt.eventId}' at '${receipt.threshold}' already exists`
        )
      }
      state.receipts.set(key, clone(receipt))
      onRollback(() => state.receipts.delete(key))
    },

    async getReceiptsByEvent(eventId) {
      return [...state.receipts.values()].filter((r) => r.eventId === eventId).map(clone)
    },

    async getAllReceipts() {
      return [...state.receipts.values()]
        .sort((a, b) => a.eventId - b.eventId || a.sentAt.localeCompare(b.sentAt))
        .map(clone)
    },

    async close() {},
  }

  return adapter
}
