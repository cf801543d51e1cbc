/**
 * Entry point: loads configuration, opens the SQLite store, and runs the
 * reminder dispatch and daily digest jobs until SIGINT/SIGTERM.
 */

import { createSystemClock } from './clock'
import { loadConfigFromEnv } from './config'
import { describeError } from './errors'
import { createLogger } from './logger'
import { createReminderService } from './service'
import { createSqliteAdapter } from './sqlite-adapter'
import { createTelegramSink } from './telegram-sink'

async function main(): Promise<void> {
  const config = loadConfigFromEnv()
  const logger = createLogger({ level: config.logLevel, namespace: 'reminders' })

  const adapter = await createSqliteAdapter(config.databasePath, { departments: config.departments })
  const clock = createSystemClock(config.timezone)
  const sink = createTelegramSink({
    token: config.telegramBotToken,
    chatId: config.mediaGroupChatId,
    logger,
  })

  const service = createReminderService({
    adapter,
    clock,
    sink,
    logger,
    access: { adminUserIds: config.adminUserIds, allowedUserIds: config.allowedUserIds },
    dispatchCron: config.dispatchCron,
    digestCron: config.digestCron,
    receiptWriteAttempts: config.receiptWriteAttempts,
    receiptRetryDelayMs: config.receiptRetryDelayMs,
  })

  let shuttingDown = false
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return
    shuttingDown = true
    logger.info('Shutting down', { signal })
    await service.stop()
    await adapter.close()
  }
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error('Shutdown failed', { error: describeError(error) })
        process.exitCode = 1
      })
    })
  }

  service.start()
  logger.info('Reminder service running', { timezone: config.timezone, database: config.databasePath })
}

main().catch((error: unknown) => {
  createLogger().error('Startup failed', { error: describeError(error) })
  process.exitCode = 1
})
