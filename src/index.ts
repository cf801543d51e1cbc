/**
 * campus-event-reminders
 *
 * Public API exports
 */

// Error system
export {
  ReminderBotError, ReminderBotErrorCode,
  DuplicateKeyError, ForeignKeyError, InvalidDataError, StoreWriteFailureError,
  ValidationError, NotFoundError, ForbiddenError,
  SinkUnavailableError, ParseError, ConfigError,
  describeError,
} from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err, unwrap } from './result'

// Time & Date
export type { LocalDate, LocalTime, LocalDateTime } from './time-date'
export {
  parseDate, parseDisplayDate, parseTime, parseDateTime,
  makeDate, makeTime, makeDateTime,
  dateOf, timeOf,
  formatDisplayDate, formatClockTime,
  addDays, addMinutes, minutesBetween,
  toLocal, toUTC, isValidTimezone,
} from './time-date'

// Thresholds
export type { Threshold, ThresholdKind } from './thresholds'
export { THRESHOLDS, THRESHOLD_KINDS, getThreshold, isThresholdKind } from './thresholds'

// Clock
export type { Clock, FakeClock } from './clock'
export { createSystemClock, createFakeClock } from './clock'

// Store
export type {
  Adapter, Event, NewEvent, EventChanges, User, Department,
  ReminderReceipt, DepartmentCount, MockAdapterOptions,
} from './adapter'
export { createMockAdapter } from './adapter'
export type { SqliteAdapter, SqliteAdapterOptions } from './sqlite-adapter'
export { createSqliteAdapter } from './sqlite-adapter'

// Delivery
export type {
  NotificationSink, ReminderDelivery, Notice, EventNotice, DigestNotice,
} from './notification-sink'
export {
  formatReminderMessage, formatNoticeMessage, formatDigestMessage, escapeHtml,
} from './notification-sink'
export type { MessageSender, TelegramSinkOptions } from './telegram-sink'
export { createTelegramSink } from './telegram-sink'
export type { EventMirror } from './event-mirror'

// Lifecycle
export type { EventInput, EventUpdate, LifecycleDeps } from './events'
export {
  createEvent, editEvent, cancelEvent, occursAt,
  getUpcomingEvents, getEventsOnDate, getEventsByOwner, getEventsInRange,
} from './events'
export type { UserInput, AccessPolicy, Statistics } from './users'
export {
  registerUser, isAllowed, isAdmin, isRegistered,
  listDepartments, addDepartment, removeDepartment, getStatistics,
} from './users'

// Dispatch
export type { DispatchReport, DispatchDeps, DueReminder, ReminderKey } from './dispatch'
export { pollAndDispatch, findDueReminders, isWindowOpen, openThresholds } from './dispatch'
export type { DispatchLoop, DispatchLoopOptions, CycleOutcome } from './dispatch-loop'
export { createDispatchLoop } from './dispatch-loop'
export type { DigestDeps } from './digest'
export { sendDailyDigest } from './digest'

// Service
export type { ReminderService, ReminderServiceConfig } from './service'
export { createReminderService, DEFAULT_DISPATCH_CRON, DEFAULT_DIGEST_CRON } from './service'

// Logging & configuration
export type { Logger, LogLevel, LogContext, LoggerOptions } from './logger'
export { createLogger } from './logger'
export type { AppConfig, Env } from './config'
export { loadConfig, loadConfigFromEnv, envSchema, DEFAULT_DEPARTMENTS } from './config'
