/**
 * Error system for campus-event-reminders.
 *
 * Every error class extends ReminderBotError, which carries a typed error code.
 * Modules re-export the classes they throw.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const ReminderBotErrorCode = {
  // Store
  DUPLICATE_KEY: 'DUPLICATE_KEY',
  FOREIGN_KEY: 'FOREIGN_KEY',
  INVALID_DATA: 'INVALID_DATA',
  STORE_WRITE_FAILURE: 'STORE_WRITE_FAILURE',

  // Lifecycle
  VALIDATION: 'VALIDATION',
  NOT_FOUND: 'NOT_FOUND',
  FORBIDDEN: 'FORBIDDEN',

  // Delivery
  SINK_UNAVAILABLE: 'SINK_UNAVAILABLE',

  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',

  // Startup
  CONFIG: 'CONFIG',
} as const

export type ReminderBotErrorCode = (typeof ReminderBotErrorCode)[keyof typeof ReminderBotErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class ReminderBotError extends Error {
  readonly code: ReminderBotErrorCode

  constructor(code: ReminderBotErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ReminderBotError'
    this.code = code
  }
}

// ============================================================================
// Store Errors
// ============================================================================

export class DuplicateKeyError extends ReminderBotError {
  constructor(message: string) {
    super(ReminderBotErrorCode.DUPLICATE_KEY, message)
    this.name = 'DuplicateKeyError'
  }
}

export class ForeignKeyError extends ReminderBotError {
  constructor(message: string) {
    super(ReminderBotErrorCode.FOREIGN_KEY, message)
    this.name = 'ForeignKeyError'
  }
}

export class InvalidDataError extends ReminderBotError {
  constructor(message: string) {
    super(ReminderBotErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}

/** A delivery receipt could not be committed after every retry. */
export class StoreWriteFailureError extends ReminderBotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ReminderBotErrorCode.STORE_WRITE_FAILURE, message, options)
    this.name = 'StoreWriteFailureError'
  }
}

// ============================================================================
// Lifecycle Errors
// ============================================================================

export class ValidationError extends ReminderBotError {
  constructor(message: string) {
    super(ReminderBotErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

export class NotFoundError extends ReminderBotError {
  constructor(message: string) {
    super(ReminderBotErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

export class ForbiddenError extends ReminderBotError {
  constructor(message: string) {
    super(ReminderBotErrorCode.FORBIDDEN, message)
    this.name = 'ForbiddenError'
  }
}

// ============================================================================
// Delivery Errors
// ============================================================================

export class SinkUnavailableError extends ReminderBotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ReminderBotErrorCode.SINK_UNAVAILABLE, message, options)
    this.name = 'SinkUnavailableError'
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends ReminderBotError {
  constructor(message: string) {
    super(ReminderBotErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigError extends ReminderBotError {
  readonly issues: readonly string[]

  constructor(issues: readonly string[]) {
    super(ReminderBotErrorCode.CONFIG, `Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

// ============================================================================
// Helpers
// ============================================================================

/** Message of any thrown value, for log context. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`
  return String(error)
}
