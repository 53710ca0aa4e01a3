import { describe, it, expect, vi } from 'vitest'
import {
  formatDate,
  formatDateTime,
  formatDuration,
  formatLongDate,
  formatTriggerClock,
  getLocalTime,
  getZonedTime,
  isTimeOfDay,
  parseTimeOfDay,
  resolveTime,
  sameDayAt,
} from '../../../src/utils/time.js'
import { TimezoneUnavailableError } from '../../../src/core/rollcall/errors.js'
import type { Logger } from '../../../src/utils/logger.js'

function createLog() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger
}

describe('getZonedTime', () => {
  it('converts an instant to civil time in the zone', () => {
    expect(getZonedTime('Asia/Ho_Chi_Minh', new Date('2024-03-04T01:02:03.000Z'))).toEqual({
      year: 2024,
      month: 3,
      day: 4,
      hour: 8,
      minute: 2,
      second: 3,
      weekday: 'Monday',
      monthName: 'March',
    })
  })

  it('rolls over to the next day', () => {
    const time = getZonedTime('Asia/Ho_Chi_Minh', new Date('2024-12-31T17:30:00.000Z'))

    expect(formatDateTime(time)).toBe('2025-01-01 00:30:00')
  })

  it('throws for unknown zones', () => {
    expect(() => getZonedTime('Not/AZone', new Date())).toThrow(TimezoneUnavailableError)
  })
})

describe('resolveTime', () => {
  it('uses the zone when available', () => {
    const log = createLog()
    const resolved = resolveTime('UTC', new Date('2024-03-04T01:02:03.000Z'), log)

    expect(resolved.fallback).toBe(false)
    expect(formatDateTime(resolved.time)).toBe('2024-03-04 01:02:03')
    expect(log.warn).not.toHaveBeenCalled()
  })

  it('falls back to local time and logs a warning', () => {
    const log = createLog()
    const date = new Date('2024-03-04T01:02:03.000Z')

    const resolved = resolveTime('Not/AZone', date, log)

    expect(resolved).toEqual({ time: getLocalTime(date), fallback: true })
    expect(log.warn).toHaveBeenCalledTimes(1)
  })
})

describe('formatting', () => {
  const time = getZonedTime('UTC', new Date('2006-01-02T15:04:05.000Z'))

  it('formats dates and times', () => {
    expect(formatDate(time)).toBe('2006-01-02')
    expect(formatDateTime(time)).toBe('2006-01-02 15:04:05')
    expect(formatTriggerClock(time)).toBe('15:04:00')
    expect(formatLongDate(time)).toBe('Monday, January 2, 2006')
  })

  it('formats durations', () => {
    expect(formatDuration(3_723_000)).toBe('1h 2m 3s')
    expect(formatDuration(123_000)).toBe('2m 3s')
    expect(formatDuration(3_000)).toBe('3s')
    expect(formatDuration(-5)).toBe('0s')
  })
})

describe('time of day', () => {
  it('validates HH:MM:SS', () => {
    expect(isTimeOfDay('17:30:00')).toBe(true)
    expect(isTimeOfDay('24:00:00')).toBe(false)
    expect(isTimeOfDay('7:30:00')).toBe(false)
  })

  it('parses and rejects values', () => {
    expect(parseTimeOfDay('17:30:05')).toEqual({ hour: 17, minute: 30, second: 5 })
    expect(() => parseTimeOfDay('17:30')).toThrow('Invalid time of day "17:30"')
  })

  it('places a time of day on the same civil date', () => {
    const morning = getZonedTime('UTC', new Date('2024-03-04T08:00:00.000Z'))

    expect(sameDayAt(morning, { hour: 17, minute: 30, second: 0 })).toMatchObject({
      year: 2024,
      month: 3,
      day: 4,
      hour: 17,
      minute: 30,
      second: 0,
    })
    expect(sameDayAt(morning, { hour: 8, minute: 0, second: 0 })).not.toBeNull()
    expect(sameDayAt(morning, { hour: 7, minute: 59, second: 59 })).toBeNull()
  })
})
