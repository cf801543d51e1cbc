/**
 * Logger
 *
 * Namespaced logging backed by adze. Components take a Logger by injection so
 * tests can record what was logged.
 */

import adze, { setup } from 'adze'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogContext = Record<string, unknown>

export interface Logger {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
  /** Logger whose namespace is this logger's namespace plus `namespace`. */
  child(namespace: string): Logger
}

export type LoggerOptions = {
  level?: LogLevel
  namespace?: string
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

function withContext(message: string, context: LogContext | undefined): [string, LogContext?] {
  return context && Object.keys(context).length > 0 ? [message, context] : [message]
}

function namespacedLogger(namespaces: readonly string[]): Logger {
  const log = () => (namespaces.length > 0 ? adze.ns(...namespaces) : adze.ns('reminders'))
  return {
    debug: (message, context) => log().debug(...withContext(message, context)),
    info: (message, context) => log().info(...withContext(message, context)),
    warn: (message, context) => log().warn(...withContext(message, context)),
    error: (message, context) => log().error(...withContext(message, context)),
    child: (namespace) => namespacedLogger([...namespaces, namespace]),
  }
}

/**
 * Configures adze's global store for the process and returns the root logger.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  setup({
    activeLevel: options.level ?? 'info',
    format: 'pretty',
    withEmoji: false,
  })
  return namespacedLogger(options.namespace ? [options.namespace] : [])
}
