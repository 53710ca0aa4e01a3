import path from 'node:path'
import dotenv from 'dotenv'
import { z } from 'zod'
import { hostnameOf, parseAllowedHostnames } from '../integrations/erp/hosts.js'
import { isTimeOfDay } from '../utils/time.js'
import type { Trigger } from '../core/scheduler/service.js'

const DEFAULT_TIMEZONE = 'Asia/Ho_Chi_Minh'

const optionalString = z.preprocess((value) => {
  if (typeof value === 'string' && value.trim().length === 0) return undefined
  return value
}, z.string().optional())

const boolSchema = (defaultValue: boolean) => z.preprocess((value) => {
  if (typeof value === 'boolean') return value
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase()
    if (normalized === '') return undefined
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false
  }
  return value
}, z.boolean().default(defaultValue))

const integerSchema = (defaultValue: number, minValue: number) => z.preprocess((value) => {
  if (typeof value === 'string') {
    if (value.trim().length === 0) return undefined
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : value
  }
  return value
}, z.number().int().min(minValue).default(defaultValue))

const logLevelSchema = z.preprocess((value) => {
  if (typeof value === 'string') return value.toLowerCase()
  return value
}, z.enum(['debug', 'info', 'warn', 'error']).default('info'))

const timeOfDayMessage = 'must be a time of day formatted HH:MM:SS'

// Scheduler triggers match whole minutes, so seconds must be 00. "off" disables one.
const triggerTimeSchema = (defaultValue: string) => z.preprocess((value) => {
  if (typeof value !== 'string') return value
  const trimmed = value.trim()
  if (trimmed === '') return undefined
  if (['off', 'none', 'disabled'].includes(trimmed.toLowerCase())) return null
  return trimmed
}, z.string()
  .refine(isTimeOfDay, timeOfDayMessage)
  .refine(value => value.endsWith(':00'), 'must fall on a whole minute (HH:MM:00)')
  .nullable()
  .default(defaultValue))

const optionalTimeOfDay = z.preprocess((value) => {
  if (typeof value === 'string' && value.trim().length === 0) return undefined
  return typeof value === 'string' ? value.trim() : value
}, z.string().refine(isTimeOfDay, timeOfDayMessage).optional())

const timezoneSchema = z.preprocess((value) => {
  if (typeof value === 'string' && value.trim().length === 0) return undefined
  return value
}, z.string().default(DEFAULT_TIMEZONE))

export const envSchema = z.object({
  DATA_PATH: z.string().default('.data'),
  EMPLOYEE_DIRECTORY_PATH: optionalString,
  ROLL_CALL_TIMEZONE: timezoneSchema,
  ROLL_CALL_START_TIME: triggerTimeSchema('08:00:00'),
  ROLL_CALL_END_TIME: triggerTimeSchema('17:30:00'),
  ROLL_CALL_REMINDER_TIME: triggerTimeSchema('17:00:00'),
  AUTO_CHECKOUT_TIME: optionalTimeOfDay,
  ROLL_CALL_CHANNEL_IDS: optionalString,
  NOTIFY_CHANNEL_IDS: optionalString,
  SCHEDULER_ENABLED: boolSchema(true),
  ERP_DOMAIN: optionalString,
  ERP_API_KEY: optionalString,
  ERP_API_SECRET: optionalString,
  ERP_OWNER: z.string().default('Administrator'),
  ERP_TIMEOUT_MS: integerSchema(10000, 1000),
  ALLOWED_UPSTREAM_HOSTNAMES: optionalString,
  DISCORD_BOT_TOKEN: optionalString,
  DISCORD_APP_ID: optionalString,
  DISCORD_GUILD_ID: optionalString,
  DISCORD_WEBHOOK_URL: optionalString,
  LOG_LEVEL: logLevelSchema,
  LOG_SUMMARY_PATH: optionalString,
  LOG_DETAIL_PATH: optionalString,
})

export type EnvConfig = z.infer<typeof envSchema>

export type AppConfig = EnvConfig & {
  employeeDirectoryPath: string
  logSummaryPath: string
  logDetailPath: string
  rollCallChannelIds: string[]
  notifyChannelIds: string[]
  allowedHostnames: string[]
  triggers: Trigger[]
}

function parseList(value: string | undefined): string[] {
  return Array.from(
    new Set(
      (value ?? '')
        .split(',')
        .map(entry => entry.trim())
        .filter(entry => entry.length > 0),
    ),
  )
}

function erpHostname(domain: string | undefined): string | undefined {
  if (!domain) return undefined
  try {
    return hostnameOf(new URL(domain))
  }
  catch {
    return undefined
  }
}

function buildTriggers(parsed: EnvConfig): Trigger[] {
  const triggers: Trigger[] = []
  if (parsed.ROLL_CALL_START_TIME) triggers.push({ time: parsed.ROLL_CALL_START_TIME, action: 'open-all' })
  if (parsed.ROLL_CALL_REMINDER_TIME) triggers.push({ time: parsed.ROLL_CALL_REMINDER_TIME, action: 'reminder-sweep' })
  if (parsed.ROLL_CALL_END_TIME) triggers.push({ time: parsed.ROLL_CALL_END_TIME, action: 'close-all' })
  return triggers
}

/**
 * Parses configuration from an environment map. Without an explicit
 * allow-list, only the ERP domain's own host may be contacted.
 */
export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = envSchema.parse(env)
  const dataPath = parsed.DATA_PATH
  const logsPath = path.join(dataPath, 'logs')
  const configuredHosts = parseAllowedHostnames(parsed.ALLOWED_UPSTREAM_HOSTNAMES)
  const defaultHost = erpHostname(parsed.ERP_DOMAIN)

  return {
    ...parsed,
    employeeDirectoryPath: parsed.EMPLOYEE_DIRECTORY_PATH ?? path.join(dataPath, 'employees.json'),
    logSummaryPath: parsed.LOG_SUMMARY_PATH ?? path.join(logsPath, 'summary.log'),
    logDetailPath: parsed.LOG_DETAIL_PATH ?? path.join(logsPath, 'detail.log'),
    rollCallChannelIds: parseList(parsed.ROLL_CALL_CHANNEL_IDS),
    notifyChannelIds: parseList(parsed.NOTIFY_CHANNEL_IDS),
    allowedHostnames: configuredHosts.length > 0 || !defaultHost ? configuredHosts : [defaultHost],
    triggers: buildTriggers(parsed),
  }
}

export function loadConfig(): AppConfig {
  dotenv.config()
  return parseConfig(process.env)
}
