import fs from 'node:fs/promises'
import path from 'node:path'
import { z } from 'zod'
import type { RollCallSummary } from '../rollcall/types.js'
import { logger } from '../../utils/logger.js'

export interface SummaryArchive {
  append(summary: RollCallSummary): Promise<void>
}

const summaryEntrySchema = z.object({
  personId: z.string(),
  responded: z.boolean(),
  checkInSynced: z.boolean(),
  checkOutSynced: z.boolean(),
  note: z.string().optional(),
})

const summarySchema = z.object({
  channelId: z.string(),
  initiatorId: z.string(),
  startedAt: z.string(),
  endedAt: z.string(),
  durationMs: z.number(),
  durationLabel: z.string(),
  date: z.string(),
  responseCount: z.number().int(),
  checkInCount: z.number().int(),
  checkOutCount: z.number().int(),
  entries: z.array(summaryEntrySchema),
})

const archiveSchema = z.object({
  summaries: z.array(summarySchema).default([]),
})

export type ArchiveFile = z.infer<typeof archiveSchema>

/**
 * Closed roll calls, appended to `<dataPath>/rollcalls.json`. Oldest entries
 * are dropped beyond `maxEntries`.
 */
export class JsonSummaryArchive implements SummaryArchive {
  readonly dataPath: string
  private readonly maxEntries: number
  private writing: Promise<void> = Promise.resolve()

  constructor(dataPath: string, maxEntries = 500) {
    this.dataPath = dataPath
    this.maxEntries = maxEntries
  }

  get filePath(): string {
    return path.join(this.dataPath, 'rollcalls.json')
  }

  async load(): Promise<ArchiveFile> {
    let raw: string
    try {
      raw = await fs.readFile(this.filePath, 'utf8')
    }
    catch {
      logger.debug('Roll call archive not found; starting empty', { path: this.filePath })
      return archiveSchema.parse({})
    }
    try {
      return archiveSchema.parse(JSON.parse(raw))
    }
    catch (error) {
      logger.warn('Roll call archive unreadable; starting empty', { path: this.filePath, error })
      return archiveSchema.parse({})
    }
  }

  append(summary: RollCallSummary): Promise<void> {
    // Appends are serialized; each one re-reads the file.
    const next = this.writing.then(() => this.write(summary))
    this.writing = next.catch(() => undefined)
    return next
  }

  private async write(summary: RollCallSummary): Promise<void> {
    const archive = await this.load()
    const summaries = archive.summaries.concat(summarySchema.parse(summary)).slice(-this.maxEntries)
    try {
      await fs.mkdir(this.dataPath, { recursive: true })
      await fs.writeFile(this.filePath, JSON.stringify({ summaries }, null, 2), 'utf8')
      logger.debug('Roll call archived', { path: this.filePath, channelId: summary.channelId })
    }
    catch (error) {
      logger.error('Roll call archive save failed', { path: this.filePath, error })
      throw error
    }
  }
}
