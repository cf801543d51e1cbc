/**
 * Notification Sink
 *
 * Delivery boundary for the media group chat, plus the HTML message
 * formatting shared by every sink implementation.
 */

import type { Event, User } from './adapter'
import type { Threshold } from './thresholds'
import { formatClockTime, formatDisplayDate } from './time-date'
import type { LocalDate } from './time-date'

export { SinkUnavailableError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type ReminderDelivery = {
  event: Event
  threshold: Threshold
  /** Null when the owner record is missing */
  owner: User | null
}

export type EventNotice = {
  kind: 'created' | 'updated' | 'cancelled'
  event: Event
  owner: User | null
  /** Fields that changed, for `updated` */
  changedFields?: readonly string[]
}

export type DigestNotice = {
  kind: 'digest'
  date: LocalDate
  events: ReadonlyArray<{ event: Event; owner: User | null }>
}

export type Notice = EventNotice | DigestNotice

/**
 * Delivers messages to the fixed destination chat. A rejected promise means
 * the message was not delivered; implementations reject with
 * SinkUnavailableError.
 */
export interface NotificationSink {
  deliverReminder(delivery: ReminderDelivery): Promise<void>
  deliverNotice(notice: Notice): Promise<void>
}

// ============================================================================
// Formatting
// ============================================================================

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
}

function eventLines(event: Event): string[] {
  return [
    `<b>${escapeHtml(event.title)}</b>`,
    '',
    `📅 Date: ${formatDisplayDate(event.date)}`,
    `🕐 Time: ${formatClockTime(event.time)}`,
    `📍 Place: ${escapeHtml(event.place)}`,
    `💬 Comment: ${event.comment ? escapeHtml(event.comment) : 'No comment'}`,
  ]
}

function ownerLines(owner: User | null): string[] {
  if (!owner) return []
  return [
    '',
    `👤 Organizer: ${escapeHtml(owner.fullName)}`,
    `🏢 Department: ${escapeHtml(owner.department)}`,
    `📱 Phone: ${escapeHtml(owner.phone)}`,
  ]
}

export function formatReminderMessage({ event, threshold, owner }: ReminderDelivery): string {
  return [
    '🔔 <b>Event reminder</b>',
    '',
    ...eventLines(event),
    ...ownerLines(owner),
    '',
    `⏰ <b>${threshold.label}</b> left!`,
  ].join('\n')
}

const NOTICE_HEADINGS: Record<EventNotice['kind'], string> = {
  created: '🆕 <b>New event</b>',
  updated: '✏️ <b>Event updated</b>',
  cancelled: '❌ <b>Event cancelled</b>',
}

export function formatDigestMessage(notice: DigestNotice): string {
  const heading = `📋 <b>Events for ${formatDisplayDate(notice.date)}</b>`
  if (notice.events.length === 0) {
    return `${heading}\n\nNo events scheduled for today.`
  }
  const entries = notice.events.map(({ event, owner }, i) => {
    const who = owner ? ` (${escapeHtml(owner.department)})` : ''
    return `${i + 1}. ${formatClockTime(event.time)} <b>${escapeHtml(event.title)}</b>, ${escapeHtml(event.place)}${who}`
  })
  return [heading, '', ...entries].join('\n')
}

export function formatNoticeMessage(notice: Notice): string {
  if (notice.kind === 'digest') return formatDigestMessage(notice)

  const lines = [NOTICE_HEADINGS[notice.kind], '', ...eventLines(notice.event), ...ownerLines(notice.owner)]
  if (notice.kind === 'updated' && notice.changedFields && notice.changedFields.length > 0) {
    lines.push('', `Changed: ${notice.changedFields.join(', ')}`)
  }
  return lines.join('\n')
}
