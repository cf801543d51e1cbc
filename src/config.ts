/**
 * Configuration
 *
 * Environment settings, validated with zod. `loadConfig` reads a plain env
 * record; `loadConfigFromEnv` first merges a `.env` file into process.env.
 */

import { config as loadDotEnv } from 'dotenv'
import { z } from 'zod'
import departmentsJson from '../config/departments.json'
import { ConfigError } from './errors'
import type { LogLevel } from './logger'
import { isValidTimezone } from './time-date'

export { ConfigError }

export const DEFAULT_DEPARTMENTS: readonly string[] = z.array(z.string().min(1)).parse(departmentsJson)

// ============================================================================
// Schema
// ============================================================================

const integerId = /^-?\d+$/

const idList = z
  .string()
  .optional()
  .transform((value, ctx) => {
    const ids: number[] = []
    for (const part of (value ?? '').split(',')) {
      const trimmed = part.trim()
      if (trimmed === '') continue
      if (!integerId.test(trimmed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${trimmed}' is not an integer user id` })
        return z.NEVER
      }
      ids.push(Number(trimmed))
    }
    return ids
  })

const departmentList = z
  .string()
  .optional()
  .transform((value) => {
    const names = (value ?? '').split(';').map((s) => s.trim()).filter((s) => s !== '')
    return names.length > 0 ? names : [...DEFAULT_DEPARTMENTS]
  })

export const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().min(1, 'Telegram bot token is required'),
  MEDIA_GROUP_CHAT_ID: z
    .string({ required_error: 'Media group chat id is required' })
    .trim()
    .regex(integerId, 'must be an integer chat id')
    .transform(Number),
  ADMIN_USER_IDS: idList,
  ALLOWED_USER_IDS: idList,
  DATABASE_PATH: z.string().min(1).default('database.db'),
  TIMEZONE: z
    .string()
    .default('Asia/Tashkent')
    .refine(isValidTimezone, 'must be a valid IANA timezone'),
  DISPATCH_CRON: z.string().min(1).default('0 * * * * *'),
  DIGEST_CRON: z.string().min(1).default('0 0 8 * * *'),
  RECEIPT_WRITE_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  RECEIPT_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(200),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  DEPARTMENTS: departmentList,
})

// ============================================================================
// Config
// ============================================================================

export type AppConfig = {
  telegramBotToken: string
  mediaGroupChatId: number
  adminUserIds: number[]
  allowedUserIds: number[]
  databasePath: string
  timezone: string
  dispatchCron: string
  digestCron: string
  receiptWriteAttempts: number
  receiptRetryDelayMs: number
  logLevel: LogLevel
  departments: string[]
}

export type Env = Record<string, string | undefined>

/**
 * Validates `env` and maps it to AppConfig. Throws ConfigError listing every
 * invalid key.
 */
export function loadConfig(env: Env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`))
  }
  const e = parsed.data
  return {
    telegramBotToken: e.TELEGRAM_BOT_TOKEN,
    mediaGroupChatId: e.MEDIA_GROUP_CHAT_ID,
    adminUserIds: e.ADMIN_USER_IDS,
    allowedUserIds: e.ALLOWED_USER_IDS,
    databasePath: e.DATABASE_PATH,
    timezone: e.TIMEZONE,
    dispatchCron: e.DISPATCH_CRON,
    digestCron: e.DIGEST_CRON,
    receiptWriteAttempts: e.RECEIPT_WRITE_ATTEMPTS,
    receiptRetryDelayMs: e.RECEIPT_RETRY_DELAY_MS,
    logLevel: e.LOG_LEVEL,
    departments: e.DEPARTMENTS,
  }
}

/** Loads `.env` (if present) into process.env, then validates it. */
export function loadConfigFromEnv(path?: string): AppConfig {
  loadDotEnv(path ? { path } : {})
  return loadConfig(process.env)
}
