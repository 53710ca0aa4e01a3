import type { RespondResult, RollCallSession, SyncKind } from './types.js'
import { NoSuchSessionError, RollCallConflictError, SessionNotFoundError } from './errors.js'
import type { Clock } from '../../utils/time.js'
import { systemClock } from '../../utils/time.js'

interface SessionRecord {
  channelId: string
  initiatorId: string
  startedAt: Date
  endedAt?: Date
  active: boolean
  responseCount: number
  responders: Set<string>
  notes: Map<string, string>
  synced: Record<SyncKind, Set<string>>
  pending: Record<SyncKind, Set<string>>
}

function emptyKindSets(): Record<SyncKind, Set<string>> {
  return { check_in: new Set(), check_out: new Set(), absence: new Set() }
}

function toSnapshot(record: SessionRecord): RollCallSession {
  return {
    channelId: record.channelId,
    initiatorId: record.initiatorId,
    startedAt: new Date(record.startedAt.getTime()),
    endedAt: record.endedAt ? new Date(record.endedAt.getTime()) : undefined,
    active: record.active,
    responseCount: record.responseCount,
    responders: Array.from(record.responders),
    notes: Object.fromEntries(record.notes),
    synced: {
      check_in: Array.from(record.synced.check_in),
      check_out: Array.from(record.synced.check_out),
      absence: Array.from(record.synced.absence),
    },
  }
}

/**
 * Owns every roll-call session, keyed by channel.
 *
 * All methods are synchronous: each runs to completion before any other
 * caller observes the map, so a method body is its own critical section.
 * Nothing here performs I/O; callers use the returned flags to decide whether
 * to call out, and report the outcome back through {@link markSynced} or
 * {@link releaseSync}.
 */
export class SessionStore {
  private readonly sessions = new Map<string, SessionRecord>()
  private readonly clock: Clock

  constructor(clock: Clock = systemClock) {
    this.clock = clock
  }

  open(channelId: string, initiatorId: string): RollCallSession {
    const existing = this.sessions.get(channelId)
    if (existing?.active) {
      throw new RollCallConflictError('already_active', channelId)
    }

    const record: SessionRecord = {
      channelId,
      initiatorId,
      startedAt: this.clock(),
      active: true,
      responseCount: 0,
      responders: new Set(),
      notes: new Map(),
      synced: emptyKindSets(),
      pending: emptyKindSets(),
    }
    this.sessions.set(channelId, record)
    return toSnapshot(record)
  }

  close(channelId: string): RollCallSession {
    const record = this.requireActive(channelId)
    record.active = false
    record.endedAt = this.clock()
    return toSnapshot(record)
  }

  respond(channelId: string, responderId: string, note?: string): RespondResult {
    const record = this.requireActive(channelId)
    let isNewResponse = false
    if (!record.responders.has(responderId)) {
      record.responders.add(responderId)
      record.responseCount += 1
      isNewResponse = true
    }
    const trimmed = note?.trim()
    if (trimmed) {
      record.notes.set(responderId, trimmed)
    }
    return { session: toSnapshot(record), isNewResponse }
  }

  hasResponded(channelId: string, responderId: string): boolean {
    return this.sessions.get(channelId)?.responders.has(responderId) ?? false
  }

  /**
   * Reserves the external call for one person and kind. Returns `false` when
   * the session is not active, the person is already synced, or another
   * caller holds the claim.
   */
  claimSync(channelId: string, responderId: string, kind: SyncKind): boolean {
    const record = this.sessions.get(channelId)
    if (!record?.active) return false
    if (record.synced[kind].has(responderId)) return false
    if (record.pending[kind].has(responderId)) return false
    record.pending[kind].add(responderId)
    return true
  }

  releaseSync(channelId: string, responderId: string, kind: SyncKind): void {
    this.sessions.get(channelId)?.pending[kind].delete(responderId)
  }

  markSynced(channelId: string, responderId: string, kind: SyncKind): void {
    const record = this.sessions.get(channelId)
    if (!record) {
      throw new NoSuchSessionError(channelId)
    }
    if (!record.active) {
      throw new RollCallConflictError('session_closed', channelId)
    }
    record.pending[kind].delete(responderId)
    record.synced[kind].add(responderId)
  }

  isSynced(channelId: string, responderId: string, kind: SyncKind): boolean {
    return this.sessions.get(channelId)?.synced[kind].has(responderId) ?? false
  }

  isActive(channelId: string): boolean {
    return this.sessions.get(channelId)?.active === true
  }

  snapshot(channelId: string): RollCallSession {
    const record = this.sessions.get(channelId)
    if (!record) {
      throw new SessionNotFoundError(channelId)
    }
    return toSnapshot(record)
  }

  activeChannelIds(): string[] {
    return Array.from(this.sessions.values())
      .filter(record => record.active)
      .map(record => record.channelId)
  }

  remove(channelId: string): boolean {
    return this.sessions.delete(channelId)
  }

  private requireActive(channelId: string): SessionRecord {
    const record = this.sessions.get(channelId)
    if (!record?.active) {
      throw new RollCallConflictError('no_active_session', channelId)
    }
    return record
  }
}
