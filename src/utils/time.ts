import { TimezoneUnavailableError } from '../core/rollcall/errors.js'
import type { Logger } from './logger.js'

export type Clock = () => Date

export const systemClock: Clock = () => new Date()

export interface CivilTime {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
  weekday: string
  monthName: string
}

export interface TimeOfDay {
  hour: number
  minute: number
  second: number
}

const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):([0-5]\d):([0-5]\d)$/

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

function buildFormatter(timeZone: string | undefined): Intl.DateTimeFormat {
  return new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: 'long',
    day: 'numeric',
    weekday: 'long',
    hour: 'numeric',
    minute: 'numeric',
    second: 'numeric',
    hourCycle: 'h23',
  })
}

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
]

function toCivilTime(formatter: Intl.DateTimeFormat, date: Date): CivilTime {
  const parts = new Map(formatter.formatToParts(date).map(part => [part.type, part.value]))
  const read = (type: Intl.DateTimeFormatPartTypes) => Number(parts.get(type))
  const monthName = parts.get('month') ?? ''
  return {
    year: read('year'),
    month: MONTHS.indexOf(monthName) + 1,
    day: read('day'),
    hour: read('hour'),
    minute: read('minute'),
    second: read('second'),
    weekday: parts.get('weekday') ?? '',
    monthName,
  }
}

/**
 * Civil time in `timeZone`. Throws {@link TimezoneUnavailableError} when the
 * runtime has no data for the zone.
 */
export function getZonedTime(timeZone: string, date: Date = new Date()): CivilTime {
  let formatter: Intl.DateTimeFormat
  try {
    formatter = buildFormatter(timeZone)
  }
  catch (error) {
    throw new TimezoneUnavailableError(timeZone, { cause: error })
  }
  return toCivilTime(formatter, date)
}

export function getLocalTime(date: Date = new Date()): CivilTime {
  return toCivilTime(buildFormatter(undefined), date)
}

export interface ResolvedTime {
  time: CivilTime
  fallback: boolean
}

/**
 * Civil time in `timeZone`, or process-local time when the zone cannot be
 * resolved. The fallback is logged, never thrown.
 */
export function resolveTime(timeZone: string, date: Date, log: Logger): ResolvedTime {
  try {
    return { time: getZonedTime(timeZone, date), fallback: false }
  }
  catch (error) {
    if (!(error instanceof TimezoneUnavailableError)) throw error
    log.warn('Timezone unavailable; falling back to process local time', { timeZone, error })
    return { time: getLocalTime(date), fallback: true }
  }
}

export function formatDateTime(time: CivilTime): string {
  return `${formatDate(time)} ${pad(time.hour)}:${pad(time.minute)}:${pad(time.second)}`
}

export function formatDate(time: CivilTime): string {
  return `${time.year}-${pad(time.month)}-${pad(time.day)}`
}

// Trigger comparison works on whole minutes.
export function formatTriggerClock(time: CivilTime): string {
  return `${pad(time.hour)}:${pad(time.minute)}:00`
}

export function formatLongDate(time: CivilTime): string {
  return `${time.weekday}, ${time.monthName} ${time.day}, ${time.year}`
}

export function isTimeOfDay(value: string): boolean {
  return TIME_OF_DAY_PATTERN.test(value)
}

export function parseTimeOfDay(value: string): TimeOfDay {
  const match = TIME_OF_DAY_PATTERN.exec(value.trim())
  if (!match) {
    throw new Error(`Invalid time of day "${value}" (expected HH:MM:SS)`)
  }
  return {
    hour: Number(match[1]),
    minute: Number(match[2]),
    second: Number(match[3]),
  }
}

function secondsOfDay(time: TimeOfDay): number {
  return time.hour * 3600 + time.minute * 60 + time.second
}

/**
 * The configured time of day on the same civil date as `now`, or `null` when
 * that moment has already passed.
 */
export function sameDayAt(now: CivilTime, at: TimeOfDay): CivilTime | null {
  if (secondsOfDay(at) < secondsOfDay(now)) return null
  return { ...now, hour: at.hour, minute: at.minute, second: at.second }
}

export function formatDuration(durationMs: number): string {
  const totalSeconds = Math.max(0, Math.round(durationMs / 1000))
  const hours = Math.floor(totalSeconds / 3600)
  const minutes = Math.floor((totalSeconds % 3600) / 60)
  const seconds = totalSeconds % 60
  if (hours > 0) return `${hours}h ${minutes}m ${seconds}s`
  if (minutes > 0) return `${minutes}m ${seconds}s`
  return `${seconds}s`
}
