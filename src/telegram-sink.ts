/**
 * Telegram Sink
 *
 * Posts reminders, announcements and digests to the media group chat through
 * the Telegram Bot API.
 */

import { Telegraf, TelegramError } from 'telegraf'
import { SinkUnavailableError } from './errors'
import type { Logger } from './logger'
import { formatNoticeMessage, formatReminderMessage } from './notification-sink'
import type { NotificationSink } from './notification-sink'

/** The part of the Bot API client the sink uses. */
export interface MessageSender {
  sendMessage(chatId: number, text: string, extra: { parse_mode: 'HTML' }): Promise<unknown>
}

export type TelegramSinkOptions = {
  chatId: number
  logger: Logger
  /** Required unless `sender` is given */
  token?: string
  sender?: MessageSender
}

function describeFailure(error: unknown): string {
  if (error instanceof TelegramError) return `Telegram API error ${error.code}: ${error.description}`
  if (error instanceof Error) return error.message
  return String(error)
}

export function createTelegramSink(options: TelegramSinkOptions): NotificationSink {
  const sender = options.sender ?? createSender(options.token)
  const log = options.logger.child('telegram')

  async function send(text: string, what: string): Promise<void> {
    try {
      await sender.sendMessage(options.chatId, text, { parse_mode: 'HTML' })
      log.debug(`Sent ${what}`, { chatId: options.chatId })
    } catch (error) {
      throw new SinkUnavailableError(`Failed to send ${what}: ${describeFailure(error)}`, { cause: error })
    }
  }

  return {
    async deliverReminder(delivery) {
      await send(formatReminderMessage(delivery), `${delivery.threshold.kind} reminder for event ${delivery.event.id}`)
    },

    async deliverNotice(notice) {
      const what = notice.kind === 'digest' ? `digest for ${notice.date}` : `${notice.kind} notice for event ${notice.event.id}`
      await send(formatNoticeMessage(notice), what)
    },
  }
}

function createSender(token: string | undefined): MessageSender {
  if (!token) throw new SinkUnavailableError('Telegram bot token is not configured')
  return new Telegraf(token).telegram
}
