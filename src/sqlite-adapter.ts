/**
 * SQLite Adapter
 *
 * Production implementation of the Adapter interface using better-sqlite3.
 */
import { AsyncLocalStorage } from 'node:async_hooks'
import Database from 'better-sqlite3'
import type {
  Adapter, Event, EventChanges, NewEvent, ReminderReceipt, User,
  LocalDate, LocalDateTime, LocalTime,
} from './adapter'
import { DuplicateKeyError, ForeignKeyError, InvalidDataError, NotFoundError } from './errors'
import { THRESHOLD_KINDS, isThresholdKind } from './thresholds'

export { DuplicateKeyError, ForeignKeyError, InvalidDataError, NotFoundError }

// ============================================================================
// Extended type for SQLite-specific introspection methods
// ============================================================================

export type SqliteExtras = {
  listTables(): Promise<string[]>
  getSchemaVersion(): Promise<number>
  inTransaction(): Promise<boolean>
}

export type SqliteAdapter = Adapter & SqliteExtras

export type SqliteAdapterOptions = {
  /** Departments inserted when the database is first created */
  departments?: readonly string[]
}

const SCHEMA_VERSION = 1

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY,
    full_name TEXT NOT NULL,
    department TEXT NOT NULL,
    phone TEXT NOT NULL,
    is_admin INTEGER NOT NULL DEFAULT 0 CHECK (is_admin IN (0, 1)),
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS departments (
    name TEXT PRIMARY KEY,
    is_active INTEGER NOT NULL DEFAULT 1 CHECK (is_active IN (0, 1))
  );

  CREATE TABLE IF NOT EXISTS events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    date TEXT NOT NULL,
    time TEXT NOT NULL,
    place TEXT NOT NULL,
    comment TEXT,
    owner_id INTEGER NOT NULL REFERENCES users(id) ON DELETE RESTRICT,
    is_cancelled INTEGER NOT NULL DEFAULT 0 CHECK (is_cancelled IN (0, 1)),
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_events_date ON events(date, time);
  CREATE INDEX IF NOT EXISTS idx_events_owner ON events(owner_id);

  CREATE TABLE IF NOT EXISTS reminder_receipts (
    event_id INTEGER NOT NULL REFERENCES events(id) ON DELETE RESTRICT,
    threshold TEXT NOT NULL CHECK (threshold IN (${THRESHOLD_KINDS.map((k) => `'${k}'`).join(', ')})),
    sent_at TEXT NOT NULL,
    UNIQUE(event_id, threshold)
  );

  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  const msg = e instanceof Error ? e.message : String(e)
  if (/UNIQUE constraint/i.test(msg)) throw new DuplicateKeyError(msg)
  if (/FOREIGN KEY constraint/i.test(msg)) throw new ForeignKeyError(msg)
  if (/CHECK constraint/i.test(msg)) throw new InvalidDataError(msg)
  throw e
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type UserRow = {
  id: number
  full_name: string
  department: string
  phone: string
  is_admin: number
  created_at: string
}

type DepartmentRow = {
  name: string
  is_active: number
}

type EventRow = {
  id: number
  title: string
  date: string
  time: string
  place: string
  comment: string | null
  owner_id: number
  is_cancelled: number
  created_at: string
  updated_at: string
}

type ReceiptRow = {
  event_id: number
  threshold: string
  sent_at: string
}

type DepartmentCountRow = {
  department: string
  count: number
}

// ============================================================================
// Row Mappers
// ============================================================================

function toUser(row: UserRow): User {
  return {
    id: row.id,
    fullName: row.full_name,
    department: row.department,
    phone: row.phone,
    isAdmin: row.is_admin === 1,
    createdAt: row.created_at as LocalDateTime,
  }
}

function toEvent(row: EventRow): Event {
  return {
    id: row.id,
    title: row.title,
    date: row.date as LocalDate,
    time: row.time as LocalTime,
    place: row.place,
    comment: row.comment,
    ownerId: row.owner_id,
    cancelled: row.is_cancelled === 1,
    createdAt: row.created_at as LocalDateTime,
    updatedAt: row.updated_at as LocalDateTime,
  }
}

function toReceipt(row: ReceiptRow): ReminderReceipt {
  if (!isThresholdKind(row.threshold)) {
    throw new InvalidDataError(`Unknown threshold '${row.threshold}' for event '${row.event_id}'`)
  }
  return {
    eventId: row.event_id,
    threshold: row.threshold,
    sentAt: row.sent_at as LocalDateTime,
  }
}

const EVENT_COLUMNS: ReadonlyArray<readonly [keyof EventChanges, string]> = [
  ['title', 'title'],
  ['date', 'date'],
  ['time', 'time'],
  ['place', 'place'],
  ['comment', 'comment'],
  ['cancelled', 'is_cancelled'],
  ['updatedAt', 'updated_at'],
]

function toColumnValue(value: EventChanges[keyof EventChanges]): string | number | null {
  if (typeof value === 'boolean') return value ? 1 : 0
  return value ?? null
}

const ACTIVE_ORDER = 'ORDER BY date ASC, time ASC, id ASC'

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteAdapter(
  path: string,
  options: SqliteAdapterOptions = {},
): Promise<SqliteAdapter> {
  const db = new Database(path)
  db.exec('PRAGMA foreign_keys = ON')
  db.exec(SCHEMA_SQL)

  // First open: record the schema version and seed departments
  const ver = db.prepare<[], { v: number | null }>('SELECT MAX(version) as v FROM schema_version').get()
  if (ver?.v == null) {
    const seed = db.transaction((names: readonly string[]) => {
      db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
        SCHEMA_VERSION, new Date().toISOString(),
      )
      const insert = db.prepare('INSERT OR IGNORE INTO departments (name, is_active) VALUES (?, 1)')
      for (const name of names) insert.run(name)
    })
    seed(options.departments ?? [])
  }

  // Nested calls join the caller's transaction; separate callers queue.
  const txContext = new AsyncLocalStorage<true>()
  let txQueue: Promise<void> = Promise.resolve()

  function selectEvents(where: string, ...params: (string | number)[]): Event[] {
    return db
      .prepare<(string | number)[], EventRow>(`SELECT * FROM events WHERE ${where} ${ACTIVE_ORDER}`)
      .all(...params)
      .map(toEvent)
  }

  const adapter: SqliteAdapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      if (txContext.getStore()) return fn()
      const run = async (): Promise<T> => {
        db.exec('BEGIN IMMEDIATE')
        try {
          const result = await txContext.run(true, fn)
          db.exec('COMMIT')
          return result
        } catch (e) {
          db.exec('ROLLBACK')
          throw e
        }
      }
      const result = txQueue.then(run)
      txQueue = result.then(
        () => undefined,
        () => undefined,
      )
      return result
    },

    // ================================================================
    // User
    // ================================================================
    async createUser(user) {
      safe(() =>
        db.prepare(
          'INSERT INTO users (id, full_name, department, phone, is_admin, created_at) VALUES (?, ?, ?, ?, ?, ?)',
        ).run(user.id, user.fullName, user.department, user.phone, user.isAdmin ? 1 : 0, user.createdAt),
      )
    },

    async getUser(id) {
      const row = db.prepare<[number], UserRow>('SELECT * FROM users WHERE id = ?').get(id)
      return row ? toUser(row) : null
    },

    async getAllUsers() {
      return db.prepare<[], UserRow>('SELECT * FROM users ORDER BY id').all().map(toUser)
    },

    // ================================================================
    // Department
    // ================================================================
    async createDepartment(name) {
      safe(() => db.prepare('INSERT INTO departments (name, is_active) VALUES (?, 1)').run(name))
    },

    async getDepartments(activeOnly) {
      const sql = activeOnly
        ? 'SELECT * FROM departments WHERE is_active = 1 ORDER BY name'
        : 'SELECT * FROM departments ORDER BY name'
      return db
        .prepare<[], DepartmentRow>(sql)
        .all()
        .map((row) => ({ name: row.name, active: row.is_active === 1 }))
    },

    async setDepartmentActive(name, active) {
      const info = db.prepare('UPDATE departments SET is_active = ? WHERE name = ?').run(active ? 1 : 0, name)
      if (info.changes === 0) throw new NotFoundError(`Department '${name}' not found`)
    },

    // ================================================================
    // Event
    // ================================================================
    async createEvent(event: NewEvent) {
      const info = safe(() =>
        db.prepare(
          `INSERT INTO events (title, date, time, place, comment, owner_id, is_cancelled, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        ).run(
          event.title,
          event.date,
          event.time,
          event.place,
          event.comment,
          event.ownerId,
          event.cancelled ? 1 : 0,
          event.createdAt,
          event.updatedAt,
        ),
      )
      return Number(info.lastInsertRowid)
    },

    async getEvent(id) {
      const row = db.prepare<[number], EventRow>('SELECT * FROM events WHERE id = ?').get(id)
      return row ? toEvent(row) : null
    },

    async updateEvent(id, changes) {
      const sets: string[] = []
      const values: (string | number | null)[] = []
      for (const [key, column] of EVENT_COLUMNS) {
        if (changes[key] === undefined) continue
        sets.push(`${column} = ?`)
        values.push(toColumnValue(changes[key]))
      }
      const exists = db.prepare<[number], { id: number }>('SELECT id FROM events WHERE id = ?').get(id)
      if (!exists) throw new NotFoundError(`Event '${id}' not found`)
      if (sets.length === 0) return
      safe(() => db.prepare(`UPDATE events SET ${sets.join(', ')} WHERE id = ?`).run(...values, id))
    },

    async listActiveEvents(fromDate) {
      return selectEvents('is_cancelled = 0 AND date >= ?', fromDate)
    },

    async getEventsByDate(date) {
      return selectEvents('is_cancelled = 0 AND date = ?', date)
    },

    async getEventsByOwner(ownerId) {
      return selectEvents('is_cancelled = 0 AND owner_id = ?', ownerId)
    },

    async getEventsInRange(start, end) {
      return selectEvents('is_cancelled = 0 AND date >= ? AND date <= ?', start, end)
    },

    async countEvents() {
      const row = db.prepare<[], { n: number }>('SELECT COUNT(*) as n FROM events WHERE is_cancelled = 0').get()
      return row?.n ?? 0
    },

    async countEventsByDepartment() {
      return db.prepare<[], DepartmentCountRow>(`
        SELECT u.department AS department, COUNT(*) AS count
        FROM events e JOIN users u ON u.id = e.owner_id
        WHERE e.is_cancelled = 0
        GROUP BY u.department
        ORDER BY count DESC, department ASC
      `).all()
    },

    // ================================================================
    // Reminder Receipt
    // ================================================================
    async createReceipt(receipt) {
      safe(() =>
        db.prepare('INSERT INTO reminder_receipts (event_id, threshold, sent_at) VALUES (?, ?, ?)').run(
          receipt.eventId, receipt.threshold, receipt.sentAt,
        ),
      )
    },

    async getReceiptsByEvent(eventId) {
      return db
        .prepare<[number], ReceiptRow>('SELECT * FROM reminder_receipts WHERE event_id = ?')
        .all(eventId)
        .map(toReceipt)
    },

    async getAllReceipts() {
      return db
        .prepare<[], ReceiptRow>('SELECT * FROM reminder_receipts ORDER BY event_id, sent_at')
        .all()
        .map(toReceipt)
    },

    async close() {
      db.close()
    },

    // ================================================================
    // SQLite Extras
    // ================================================================
    async listTables() {
      return db.prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      ).all().map((r) => r.name)
    },

    async getSchemaVersion() {
      const row = db.prepare<[], { v: number | null }>('SELECT MAX(version) as v FROM schema_version').get()
      return row?.v ?? 0
    },

    async inTransaction() {
      return db.inTransaction
    },
  }

  return adapter
}
