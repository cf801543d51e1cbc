/**
 * Time & Date Utilities
 *
 * Wall-clock values in the configured campus timezone are branded strings that
 * sort lexically. Arithmetic treats a wall value as if it were UTC; zone
 * offsets come from Intl.DateTimeFormat.
 */

import { ParseError } from './errors'
import { Ok, Err } from './result'
import type { Result } from './result'

export { ParseError }

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localTime: unique symbol
declare const __localDateTime: unique symbol

/** Calendar date: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/** Wall time: HH:MM:SS */
export type LocalTime = string & { readonly [__localTime]: true }

/** Wall datetime: YYYY-MM-DDThh:mm:ss */
export type LocalDateTime = string & { readonly [__localDateTime]: true }

const MS_PER_MINUTE = 60_000
const MS_PER_DAY = 86_400_000

// ============================================================================
// Helpers
// ============================================================================

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

const MONTH_DAYS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_DAYS[month - 1] ?? 0
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0')
}

function num(s: string | undefined): number {
  return parseInt(s ?? '', 10)
}

function checkDay(str: string, year: number, month: number, day: number): Result<LocalDate, ParseError> {
  if (month < 1 || month > 12) return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month)) return Err(new ParseError(`Invalid day in date: '${str}'`))
  return Ok(makeDate(year, month, day))
}

// ============================================================================
// Parsing
// ============================================================================

export function parseDate(str: string): Result<LocalDate, ParseError> {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))
  return checkDay(str, num(match[1]), num(match[2]), num(match[3]))
}

/** Parses the chat form's `DD.MM.YYYY` date. */
export function parseDisplayDate(str: string): Result<LocalDate, ParseError> {
  const match = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}' (expected DD.MM.YYYY)`))
  return checkDay(str, num(match[3]), num(match[2]), num(match[1]))
}

/** HH:MM or HH:MM:SS, normalized to HH:MM:SS. */
export function parseTime(str: string): Result<LocalTime, ParseError> {
  const match = /^(\d{2}):(\d{2})(?::(\d{2}))?$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid time format: '${str}'`))

  const hour = num(match[1])
  const minute = num(match[2])
  const second = match[3] ? num(match[3]) : 0

  if (hour > 23) return Err(new ParseError(`Invalid hour in time: '${str}'`))
  if (minute > 59) return Err(new ParseError(`Invalid minute in time: '${str}'`))
  if (second > 59) return Err(new ParseError(`Invalid second in time: '${str}'`))
  return Ok(makeTime(hour, minute, second))
}

export function parseDateTime(str: string): Result<LocalDateTime, ParseError> {
  const [datePart, timePart, ...rest] = str.split('T')
  if (datePart === undefined || timePart === undefined || rest.length > 0) {
    return Err(new ParseError(`Invalid datetime format (missing T): '${str}'`))
  }
  const date = parseDate(datePart)
  const time = parseTime(timePart)
  if (!date.ok || !time.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))
  return Ok(makeDateTime(date.value, time.value))
}

// ============================================================================
// Construction & Components
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}` as LocalDate
}

export function makeTime(hour: number, minute: number, second = 0): LocalTime {
  return `${pad(hour)}:${pad(minute)}:${pad(second)}` as LocalTime
}

export function makeDateTime(date: LocalDate, time: LocalTime): LocalDateTime {
  return `${date}T${time}` as LocalDateTime
}

export function dateOf(dt: LocalDateTime): LocalDate {
  return dt.substring(0, 10) as LocalDate
}

export function timeOf(dt: LocalDateTime): LocalTime {
  return dt.substring(11) as LocalTime
}

function dateParts(date: LocalDate): [number, number, number] {
  return [num(date.substring(0, 4)), num(date.substring(5, 7)), num(date.substring(8, 10))]
}

function timeParts(time: LocalTime): [number, number, number] {
  return [num(time.substring(0, 2)), num(time.substring(3, 5)), num(time.substring(6, 8))]
}

// ============================================================================
// Formatting
// ============================================================================

/** DD.MM.YYYY, as shown in chat messages. */
export function formatDisplayDate(date: LocalDate): string {
  const [year, month, day] = dateParts(date)
  return `${pad(day)}.${pad(month)}.${pad(year, 4)}`
}

/** HH:MM, as shown in chat messages. */
export function formatClockTime(time: LocalTime): string {
  return time.substring(0, 5)
}

// ============================================================================
// Arithmetic
// ============================================================================

/** Wall value read as a UTC instant. */
function dtToMs(dt: LocalDateTime): number {
  const [year, month, day] = dateParts(dateOf(dt))
  const [hour, minute, second] = timeParts(timeOf(dt))
  return Date.UTC(year, month - 1, day, hour, minute, second)
}

function msToDt(ms: number): LocalDateTime {
  const d = new Date(ms)
  return makeDateTime(
    makeDate(d.getUTCFullYear(), d.getUTCMonth() + 1, d.getUTCDate()),
    makeTime(d.getUTCHours(), d.getUTCMinutes(), d.getUTCSeconds()),
  )
}

function dateToMs(date: LocalDate): number {
  const [year, month, day] = dateParts(date)
  return Date.UTC(year, month - 1, day)
}

export function addDays(date: LocalDate, n: number): LocalDate {
  return dateOf(msToDt(dateToMs(date) + n * MS_PER_DAY))
}

export function daysBetween(a: LocalDate, b: LocalDate): number {
  return Math.round((dateToMs(b) - dateToMs(a)) / MS_PER_DAY)
}

export function addMinutes(dt: LocalDateTime, n: number): LocalDateTime {
  return msToDt(dtToMs(dt) + n * MS_PER_MINUTE)
}

/** Whole minutes from `a` to `b`; negative when `b` is earlier. */
export function minutesBetween(a: LocalDateTime, b: LocalDateTime): number {
  return Math.trunc((dtToMs(b) - dtToMs(a)) / MS_PER_MINUTE)
}

// ============================================================================
// Timezone Conversion
// ============================================================================

/** Offset of `tz` from UTC, in minutes, at the instant `utcMs`. */
function utcOffsetAtMs(utcMs: number, tz: string): number {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: tz,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  }).formatToParts(new Date(utcMs))
  const get = (type: Intl.DateTimeFormatPartTypes) => num(parts.find((p) => p.type === type)?.value)

  const hour = get('hour') % 24
  const wallMs = Date.UTC(get('year'), get('month') - 1, get('day'), hour, get('minute'), get('second'))
  return Math.round((wallMs - Math.floor(utcMs / 1000) * 1000) / MS_PER_MINUTE)
}

export function isValidTimezone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz })
    return true
  } catch {
    return false
  }
}

/** Wall time in `tz` at the given epoch milliseconds, truncated to seconds. */
export function fromEpochMs(ms: number, tz: string): LocalDateTime {
  return toLocal(msToDt(Math.floor(ms / 1000) * 1000), tz)
}

export function toLocal(utc: LocalDateTime, tz: string): LocalDateTime {
  const utcMs = dtToMs(utc)
  return msToDt(utcMs + utcOffsetAtMs(utcMs, tz) * MS_PER_MINUTE)
}

/**
 * UTC instant of a wall time in `tz`. A repeated wall time (fall-back
 * overlap) resolves to its first occurrence; a skipped one (spring-forward
 * gap) is pushed past the transition by the gap's length.
 */
export function toUTC(local: LocalDateTime, tz: string): LocalDateTime {
  if (tz === 'UTC') return local

  const wallMs = dtToMs(local)
  const guess = wallMs - utcOffsetAtMs(wallMs, tz) * MS_PER_MINUTE
  const corrected = wallMs - utcOffsetAtMs(guess, tz) * MS_PER_MINUTE
  if (corrected === guess) return msToDt(guess)

  const mapsBack = corrected + utcOffsetAtMs(corrected, tz) * MS_PER_MINUTE === wallMs
  return msToDt(mapsBack ? corrected : Math.max(guess, corrected))
}
