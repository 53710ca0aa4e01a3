import type { RollCallSession, RollCallSummary, SummaryEntry } from './types.js'
import { formatDuration } from '../../utils/time.js'

export function buildSummary(session: RollCallSession, date: string, endedAt: Date = session.endedAt ?? new Date()): RollCallSummary {
  const checkIns = new Set(session.synced.check_in)
  const checkOuts = new Set(session.synced.check_out)
  const entries: SummaryEntry[] = session.responders.map(personId => ({
    personId,
    responded: true,
    checkInSynced: checkIns.has(personId),
    checkOutSynced: checkOuts.has(personId),
    ...(session.notes[personId] ? { note: session.notes[personId] } : {}),
  }))
  const durationMs = Math.max(0, endedAt.getTime() - session.startedAt.getTime())

  return {
    channelId: session.channelId,
    initiatorId: session.initiatorId,
    startedAt: session.startedAt.toISOString(),
    endedAt: endedAt.toISOString(),
    durationMs,
    durationLabel: formatDuration(durationMs),
    date,
    responseCount: session.responseCount,
    checkInCount: entries.filter(entry => entry.checkInSynced).length,
    checkOutCount: entries.filter(entry => entry.checkOutSynced).length,
    entries,
  }
}

/** People marked present locally whose check-in never reached the HR system. */
export function unrecordedEntries(summary: RollCallSummary): SummaryEntry[] {
  return summary.entries.filter(entry => entry.responded && !entry.checkInSynced)
}
