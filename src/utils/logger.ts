import fs from 'node:fs'
import path from 'node:path'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'
export type LogMeta = Record<string, unknown> | undefined

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

let currentLevel: LogLevel = 'info'
let summaryStream: fs.WriteStream | null = null
let detailStream: fs.WriteStream | null = null

export interface LoggerOptions {
  level: LogLevel
  summaryPath?: string
  detailPath?: string
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void
  info(message: string, meta?: LogMeta): void
  warn(message: string, meta?: LogMeta): void
  error(message: string, meta?: LogMeta): void
}

async function openStream(filePath: string | undefined): Promise<fs.WriteStream | null> {
  if (!filePath) return null
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true })
  return fs.createWriteStream(filePath, { flags: 'a' })
}

export async function configureLogger(options: LoggerOptions): Promise<void> {
  currentLevel = options.level
  closeLogger()
  summaryStream = await openStream(options.summaryPath)
  detailStream = await openStream(options.detailPath)
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function closeLogger(): void {
  summaryStream?.end()
  detailStream?.end()
  summaryStream = null
  detailStream = null
}

function shouldLog(level: LogLevel): boolean {
  return levelOrder[level] >= levelOrder[currentLevel]
}

function timestamp(): string {
  return new Date().toISOString()
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function serializeError(error: Error): Record<string, unknown> {
  const cause = error.cause
  const code = 'code' in error ? error.code : undefined
  return {
    name: error.name,
    message: error.message,
    ...(code !== undefined ? { code } : {}),
    stack: error.stack,
    cause: cause instanceof Error ? serializeError(cause) : cause,
  }
}

function toSerializable(value: unknown): unknown {
  if (value instanceof Error) return serializeError(value)
  if (value instanceof Map) return Object.fromEntries(value.entries())
  if (value instanceof Set) return Array.from(value.values())
  if (typeof value === 'bigint') return value.toString()
  return value
}

function safeJson(value: unknown, pretty: boolean): string {
  const seen = new WeakSet<object>()
  const replacer = (_key: string, val: unknown) => {
    if (typeof val === 'object' && val !== null) {
      if (seen.has(val)) return '[Circular]'
      seen.add(val)
    }
    return toSerializable(val)
  }
  return JSON.stringify(value, replacer, pretty ? 2 : 0)
}

function formatMeta(meta: LogMeta, detail: boolean): string | null {
  if (!meta) return null
  const payload = isRecord(meta) ? meta : { value: meta }
  const compact = safeJson(payload, false)
  if (!detail) return compact
  if (compact.length > 200 || compact.includes('\\n')) {
    return safeJson(payload, true)
  }
  return compact
}

function indentLines(value: string, prefix = '  '): string {
  return value
    .split('\n')
    .map(line => `${prefix}${line}`)
    .join('\n')
}

function formatLine(level: LogLevel, scope: string | undefined, message: string, meta: LogMeta, detail: boolean): string {
  const scopeText = scope ? ` [${scope}]` : ''
  const base = `[${timestamp()}] [${level}]${scopeText} ${message}`
  const metaText = formatMeta(meta, detail)
  if (!metaText) return base
  if (!detail) return `${base} | ${metaText}`
  if (!metaText.includes('\n')) return `${base} | ${metaText}`
  return `${base}\n${indentLines(metaText)}`
}

function writeSummary(line: string, level: LogLevel): void {
  if (level === 'error') {
    console.error(line)
  }
  else if (level === 'warn') {
    console.warn(line)
  }
  else {
    console.log(line)
  }

  summaryStream?.write(`${line}\n`)
}

function writeDetail(line: string): void {
  detailStream?.write(`${line}\n`)
}

function log(level: LogLevel, scope: string | undefined, message: string, meta?: LogMeta): void {
  if (!shouldLog(level)) return
  writeSummary(formatLine(level, scope, message, meta, false), level)
  writeDetail(formatLine(level, scope, message, meta, true))
}

/**
 * Returns a logger whose lines carry a `[scope]` tag, e.g. `[scheduler]`.
 */
export function createLogger(scope?: string): Logger {
  return {
    debug: (message, meta) => log('debug', scope, message, meta),
    info: (message, meta) => log('info', scope, message, meta),
    warn: (message, meta) => log('warn', scope, message, meta),
    error: (message, meta) => log('error', scope, message, meta),
  }
}

export const logger = createLogger()

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
