/**
 * Segment 01: Time & Date Utilities Tests
 *
 * Parsing of the chat form's date/time input, wall-clock arithmetic and
 * timezone conversion.
 */

import { describe, it, expect } from 'vitest'
import {
  parseDate,
  parseDisplayDate,
  parseTime,
  parseDateTime,
  formatDisplayDate,
  formatClockTime,
  makeDate,
  makeTime,
  makeDateTime,
  addDays,
  addMinutes,
  daysBetween,
  minutesBetween,
  daysInMonth,
  dateOf,
  timeOf,
  toUTC,
  toLocal,
  fromEpochMs,
  isValidTimezone,
  type LocalDate,
  type LocalTime,
  type LocalDateTime,
} from '../src/time-date'
import { ParseError } from '../src/errors'

// ============================================================================
// 1. PARSING
// ============================================================================

describe('Parsing', () => {
  describe('parseDate', () => {
    it('accepts an ISO date', () => {
      const result = parseDate('2025-03-10')
      expect(result).toEqual({ ok: true, value: '2025-03-10' })
    })

    it('accepts a leap day', () => {
      expect(parseDate('2024-02-29').ok).toBe(true)
    })

    it('rejects Feb 29 in a non-leap year', () => {
      const result = parseDate('2025-02-29')
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ParseError)
        expect(result.error.message).toBe("Invalid day in date: '2025-02-29'")
      }
    })

    it('rejects month 13', () => {
      expect(parseDate('2025-13-01').ok).toBe(false)
    })

    it('rejects the display format', () => {
      expect(parseDate('10.03.2025').ok).toBe(false)
    })
  })

  describe('parseDisplayDate', () => {
    it('parses DD.MM.YYYY', () => {
      expect(parseDisplayDate('10.03.2025')).toEqual({ ok: true, value: '2025-03-10' })
    })

    it('pads single-digit day and month', () => {
      expect(parseDisplayDate('1.3.2025')).toEqual({ ok: true, value: '2025-03-01' })
    })

    it('rejects an impossible day', () => {
      const result = parseDisplayDate('31.04.2025')
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.message).toBe("Invalid day in date: '31.04.2025'")
    })

    it('rejects ISO input', () => {
      const result = parseDisplayDate('2025-03-10')
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.message).toBe("Invalid date format: '2025-03-10' (expected DD.MM.YYYY)")
      }
    })
  })

  describe('parseTime', () => {
    it('normalizes HH:MM to HH:MM:SS', () => {
      expect(parseTime('15:00')).toEqual({ ok: true, value: '15:00:00' })
    })

    it('accepts midnight and the last minute of the day', () => {
      expect(parseTime('00:00').ok).toBe(true)
      expect(parseTime('23:59').ok).toBe(true)
    })

    it('rejects hour 24', () => {
      const result = parseTime('24:00')
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.message).toBe("Invalid hour in time: '24:00'")
    })

    it('rejects minute 60', () => {
      expect(parseTime('12:60').ok).toBe(false)
    })

    it('rejects a single-digit hour', () => {
      expect(parseTime('9:30').ok).toBe(false)
    })
  })

  describe('parseDateTime', () => {
    it('parses date and time joined by T', () => {
      expect(parseDateTime('2025-03-10T15:00')).toEqual({ ok: true, value: '2025-03-10T15:00:00' })
    })

    it('rejects a missing T', () => {
      expect(parseDateTime('2025-03-10 15:00').ok).toBe(false)
    })
  })
})

// ============================================================================
// 2. CONSTRUCTION & FORMATTING
// ============================================================================

describe('Construction and Formatting', () => {
  it('makeDate pads components', () => {
    expect(makeDate(2025, 3, 9)).toBe('2025-03-09')
  })

  it('makeTime defaults seconds to zero', () => {
    expect(makeTime(8, 5)).toBe('08:05:00')
  })

  it('makeDateTime joins date and time', () => {
    expect(makeDateTime('2025-03-10' as LocalDate, '15:00:00' as LocalTime)).toBe('2025-03-10T15:00:00')
  })

  it('dateOf and timeOf split a datetime', () => {
    const dt = '2025-03-10T15:00:00' as LocalDateTime
    expect(dateOf(dt)).toBe('2025-03-10')
    expect(timeOf(dt)).toBe('15:00:00')
  })

  it('formatDisplayDate renders DD.MM.YYYY', () => {
    expect(formatDisplayDate('2025-03-10' as LocalDate)).toBe('10.03.2025')
  })

  it('formatClockTime drops seconds', () => {
    expect(formatClockTime('09:05:00' as LocalTime)).toBe('09:05')
  })

  it('daysInMonth knows February in leap years', () => {
    expect(daysInMonth(2024, 2)).toBe(29)
    expect(daysInMonth(2025, 2)).toBe(28)
    expect(daysInMonth(2025, 4)).toBe(30)
  })
})

// ============================================================================
// 3. ARITHMETIC
// ============================================================================

describe('Arithmetic', () => {
  it('addDays crosses a month boundary', () => {
    expect(addDays('2025-02-28' as LocalDate, 1)).toBe('2025-03-01')
  })

  it('addDays goes backwards across a year boundary', () => {
    expect(addDays('2025-01-01' as LocalDate, -1)).toBe('2024-12-31')
  })

  it('daysBetween counts calendar days', () => {
    expect(daysBetween('2025-03-01' as LocalDate, '2025-03-10' as LocalDate)).toBe(9)
  })

  it('addMinutes subtracts into the previous day', () => {
    expect(addMinutes('2025-03-10T00:05:00' as LocalDateTime, -10)).toBe('2025-03-09T23:55:00')
  })

  it('addMinutes rolls over the new year', () => {
    expect(addMinutes('2024-12-31T23:59:00' as LocalDateTime, 1)).toBe('2025-01-01T00:00:00')
  })

  it('addMinutes by a full day keeps the time of day', () => {
    expect(addMinutes('2025-03-10T15:00:00' as LocalDateTime, -1440)).toBe('2025-03-09T15:00:00')
  })

  it('minutesBetween spans days', () => {
    expect(
      minutesBetween('2025-03-09T15:00:00' as LocalDateTime, '2025-03-10T15:00:00' as LocalDateTime)
    ).toBe(1440)
  })

  it('minutesBetween is negative when b is earlier', () => {
    expect(
      minutesBetween('2025-03-10T15:00:00' as LocalDateTime, '2025-03-10T12:00:00' as LocalDateTime)
    ).toBe(-180)
  })
})

// ============================================================================
// 4. TIMEZONES
// ============================================================================

describe('Timezone Conversion', () => {
  it('toUTC for a fixed-offset zone (UTC+5)', () => {
    expect(toUTC('2025-03-10T15:00:00' as LocalDateTime, 'Asia/Tashkent')).toBe('2025-03-10T10:00:00')
  })

  it('toLocal for a fixed-offset zone', () => {
    expect(toLocal('2025-03-10T22:30:00' as LocalDateTime, 'Asia/Tashkent')).toBe('2025-03-11T03:30:00')
  })

  it('toUTC is identity for UTC', () => {
    expect(toUTC('2025-03-10T15:00:00' as LocalDateTime, 'UTC')).toBe('2025-03-10T15:00:00')
  })

  it('toUTC in daylight time (EDT -4h)', () => {
    expect(toUTC('2025-07-15T12:00:00' as LocalDateTime, 'America/New_York')).toBe('2025-07-15T16:00:00')
  })

  it('round-trips a UTC instant through local time', () => {
    const utc = '2025-03-15T17:00:00' as LocalDateTime
    expect(toUTC(toLocal(utc, 'America/New_York'), 'America/New_York')).toBe(utc)
  })

  it('pushes a wall time in the spring-forward gap past the transition', () => {
    expect(toUTC('2025-03-09T02:30:00' as LocalDateTime, 'America/New_York')).toBe('2025-03-09T07:30:00')
  })

  it('resolves a repeated fall-back wall time to its first occurrence', () => {
    expect(toUTC('2025-11-02T01:30:00' as LocalDateTime, 'America/New_York')).toBe('2025-11-02T05:30:00')
  })

  it('toUTC just after the spring-forward transition', () => {
    expect(toUTC('2025-03-09T03:30:00' as LocalDateTime, 'America/New_York')).toBe('2025-03-09T07:30:00')
  })

  it('fromEpochMs gives wall time in the zone', () => {
    expect(fromEpochMs(Date.UTC(2025, 2, 10, 10, 0, 0), 'Asia/Tashkent')).toBe('2025-03-10T15:00:00')
  })

  it('fromEpochMs truncates milliseconds', () => {
    expect(fromEpochMs(Date.UTC(2025, 2, 10, 10, 0, 59) + 999, 'UTC')).toBe('2025-03-10T10:00:59')
  })

  it('isValidTimezone', () => {
    expect(isValidTimezone('Asia/Tashkent')).toBe(true)
    expect(isValidTimezone('Mars/Olympus_Mons')).toBe(false)
  })
})
