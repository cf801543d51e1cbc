/**
 * Clock Source
 *
 * Current instant, readable as UTC or as wall time in the configured
 * timezone. The dispatch engine reads it once per cycle; tests swap in a fake
 * clock they advance by hand.
 */

import { ValidationError } from './errors'
import { addMinutes, fromEpochMs, isValidTimezone, toLocal, toUTC } from './time-date'
import type { LocalDateTime } from './time-date'

export interface Clock {
  readonly timezone: string
  /** The current instant, as a UTC wall value */
  nowUtc(): LocalDateTime
  /** The current instant, as wall time in `timezone` */
  now(): LocalDateTime
}

export interface FakeClock extends Clock {
  /** Moves to a wall time; a repeated one means its first occurrence */
  set(dt: LocalDateTime): void
  setUtc(dt: LocalDateTime): void
  advance(minutes: number): void
}

function requireTimezone(timezone: string): void {
  if (!isValidTimezone(timezone)) {
    throw new ValidationError(`Invalid timezone: '${timezone}'`)
  }
}

export function createSystemClock(timezone: string, epochMs: () => number = Date.now): Clock {
  requireTimezone(timezone)
  return {
    timezone,
    nowUtc: () => fromEpochMs(epochMs(), 'UTC'),
    now: () => fromEpochMs(epochMs(), timezone),
  }
}

export function createFakeClock(start: LocalDateTime, timezone = 'UTC'): FakeClock {
  requireTimezone(timezone)
  let instant = toUTC(start, timezone)
  return {
    timezone,
    nowUtc: () => instant,
    now: () => toLocal(instant, timezone),
    set(dt) {
      instant = toUTC(dt, timezone)
    },
    setUtc(dt) {
      instant = dt
    },
    advance(minutes) {
      instant = addMinutes(instant, minutes)
    },
  }
}
