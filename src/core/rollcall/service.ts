import type {
  AbsenceOutcome,
  AttendanceSyncClient,
  AutoCheckoutOutcome,
  EmployeeIdentity,
  IdentityResolver,
  MessageOutcome,
  ResponseOutcome,
  RollCallSession,
  RollCallSummary,
  RunReason,
  SyncKind,
  SyncOutcome,
} from './types.js'
import type { MessageDelivery, NotificationPayload } from '../notifications/types.js'
import type { SummaryArchive } from '../archive/store.js'
import { SessionStore } from './store.js'
import { EffectTracker } from './effects.js'
import { classifyMessage } from './classifier.js'
import { buildSummary, unrecordedEntries } from './summary.js'
import { RollCallConflictError, TimezoneUnavailableError } from './errors.js'
import type { CivilTime, Clock, TimeOfDay } from '../../utils/time.js'
import {
  formatDate,
  formatDateTime,
  formatLongDate,
  getZonedTime,
  parseTimeOfDay,
  resolveTime,
  sameDayAt,
  systemClock,
} from '../../utils/time.js'
import { createLogger, errorMessage } from '../../utils/logger.js'

const log = createLogger('rollcall')

const DEFAULT_ABSENCE_REASON = 'No reason provided'

export interface RollCallMessages {
  announcement(input: { date: string; autoCheckoutTime?: string }): NotificationPayload
  summary(summary: RollCallSummary): NotificationPayload
  checkInNotice(name: string, time: string): NotificationPayload
  checkOutNotice(name: string, time: string): NotificationPayload
  absenceNotice(name: string, reason: string): NotificationPayload
  reminder(input: { channelId: string; autoCheckoutTime?: string }): NotificationPayload
}

export interface RollCallServiceOptions {
  store: SessionStore
  sync: AttendanceSyncClient
  identities: IdentityResolver
  delivery: MessageDelivery
  messages: RollCallMessages
  timezone: string
  archive?: SummaryArchive
  effects?: EffectTracker
  rollCallChannelIds?: string[]
  notifyChannelIds?: string[]
  autoCheckoutTime?: string
  schedulerUserId?: string
  clock?: Clock
}

/**
 * Roll-call lifecycle: opens and closes sessions, records responses, and
 * mirrors each novel response into the HR system exactly once per session.
 * Sync failures never undo local attendance; they leave the person unsynced
 * so a repeated response retries.
 */
export class RollCallService {
  private readonly store: SessionStore
  private readonly sync: AttendanceSyncClient
  private readonly identities: IdentityResolver
  private readonly delivery: MessageDelivery
  private readonly messages: RollCallMessages
  private readonly timezone: string
  private readonly archive?: SummaryArchive
  private readonly effects: EffectTracker
  private readonly rollCallChannelIds: string[]
  private readonly notifyChannelIds: string[]
  private readonly autoCheckoutTime?: string
  private readonly autoCheckoutAt?: TimeOfDay
  private readonly schedulerUserId: string
  private readonly clock: Clock

  constructor(options: RollCallServiceOptions) {
    this.store = options.store
    this.sync = options.sync
    this.identities = options.identities
    this.delivery = options.delivery
    this.messages = options.messages
    this.timezone = options.timezone
    this.archive = options.archive
    this.effects = options.effects ?? new EffectTracker(log)
    this.rollCallChannelIds = options.rollCallChannelIds ?? []
    this.notifyChannelIds = options.notifyChannelIds ?? []
    this.autoCheckoutTime = options.autoCheckoutTime
    this.autoCheckoutAt = options.autoCheckoutTime ? parseTimeOfDay(options.autoCheckoutTime) : undefined
    this.schedulerUserId = options.schedulerUserId ?? 'scheduler'
    this.clock = options.clock ?? systemClock
  }

  startSession(channelId: string, initiatorId: string): RollCallSession {
    const session = this.store.open(channelId, initiatorId)
    log.info('Roll call started', { channelId, initiatorId })
    const announcement = this.messages.announcement({
      date: this.todayLabel(),
      autoCheckoutTime: this.autoCheckoutTime,
    })
    this.effects.run('Roll call announcement', () => this.delivery.postToChannel(channelId, announcement), { channelId })
    return session
  }

  async recordResponse(channelId: string, personId: string, note?: string): Promise<ResponseOutcome> {
    const { isNewResponse, session } = this.store.respond(channelId, personId, note)
    const storedNote = session.notes[personId]
    const base = { isNewResponse, ...(storedNote ? { note: storedNote } : {}) }
    log.debug('Roll call response', { channelId, personId, isNewResponse })

    if (!this.store.claimSync(channelId, personId, 'check_in')) {
      const synced = this.store.isSynced(channelId, personId, 'check_in')
      return { ...base, synced, alreadyRecorded: synced, timeRecorded: this.nowLabel() }
    }

    let identity: EmployeeIdentity
    let timeRecorded: string
    try {
      identity = await this.identities.resolve(personId)
      timeRecorded = await this.sync.recordCheckIn(identity)
    }
    catch (error) {
      this.store.releaseSync(channelId, personId, 'check_in')
      log.warn('Check-in sync failed; attendance kept locally', { channelId, personId, error })
      return { ...base, synced: false, timeRecorded: this.nowLabel(), failure: errorMessage(error) }
    }

    this.commitSync(channelId, personId, 'check_in')
    log.info('Check-in recorded', { channelId, personId, employeeId: identity.employeeId, time: timeRecorded })
    this.broadcast(this.messages.checkInNotice(identity.displayName, timeRecorded))

    const checkOut = await this.recordAutoCheckout(channelId, identity)
    return { ...base, synced: true, timeRecorded, ...(checkOut ? { checkOut } : {}) }
  }

  async recordCheckout(channelId: string, personId: string): Promise<SyncOutcome> {
    if (!this.store.isActive(channelId)) {
      throw new RollCallConflictError('no_active_session', channelId)
    }
    if (!this.store.hasResponded(channelId, personId)) {
      throw new RollCallConflictError('not_responded', channelId)
    }
    if (!this.store.claimSync(channelId, personId, 'check_out')) {
      const synced = this.store.isSynced(channelId, personId, 'check_out')
      return { synced, alreadyRecorded: synced, timeRecorded: this.nowLabel() }
    }

    let identity: EmployeeIdentity
    let timeRecorded: string
    try {
      identity = await this.identities.resolve(personId)
      timeRecorded = await this.sync.recordCheckOut(identity)
    }
    catch (error) {
      this.store.releaseSync(channelId, personId, 'check_out')
      log.warn('Check-out sync failed', { channelId, personId, error })
      return { synced: false, timeRecorded: this.nowLabel(), failure: errorMessage(error) }
    }

    this.commitSync(channelId, personId, 'check_out')
    log.info('Check-out recorded', { channelId, personId, employeeId: identity.employeeId, time: timeRecorded })
    this.broadcast(this.messages.checkOutNotice(identity.displayName, timeRecorded))
    return { synced: true, timeRecorded }
  }

  async recordAbsence(channelId: string, personId: string, reason?: string): Promise<AbsenceOutcome> {
    if (!this.store.isActive(channelId)) {
      throw new RollCallConflictError('no_active_session', channelId)
    }
    const absenceReason = reason?.trim() || DEFAULT_ABSENCE_REASON
    if (!this.store.claimSync(channelId, personId, 'absence')) {
      const synced = this.store.isSynced(channelId, personId, 'absence')
      return { synced, alreadyRecorded: synced, reason: absenceReason, date: this.dateLabel() }
    }

    let identity: EmployeeIdentity
    let date: string
    try {
      identity = await this.identities.resolve(personId)
      date = await this.sync.recordAbsence(identity, absenceReason)
    }
    catch (error) {
      this.store.releaseSync(channelId, personId, 'absence')
      log.warn('Absence sync failed', { channelId, personId, error })
      return { synced: false, reason: absenceReason, date: this.dateLabel(), failure: errorMessage(error) }
    }

    this.commitSync(channelId, personId, 'absence')
    log.info('Absence recorded', { channelId, personId, employeeId: identity.employeeId, date })
    this.broadcast(this.messages.absenceNotice(identity.displayName, absenceReason))
    return { synced: true, reason: absenceReason, date }
  }

  endSession(channelId: string): RollCallSummary {
    const session = this.store.close(channelId)
    const summary = buildSummary(session, this.todayLabel(), session.endedAt)
    const unrecorded = unrecordedEntries(summary)
    log.info('Roll call ended', {
      channelId,
      responses: summary.responseCount,
      checkIns: summary.checkInCount,
      checkOuts: summary.checkOutCount,
      unrecorded: unrecorded.map(entry => entry.personId),
      duration: summary.durationLabel,
    })

    const payload = this.messages.summary(summary)
    this.effects.run('Roll call summary', () => this.delivery.postToChannel(channelId, payload), { channelId })
    const archive = this.archive
    if (archive) {
      this.effects.run('Roll call archive', () => archive.append(summary), { channelId })
    }
    return summary
  }

  /** Opens a roll call in every configured channel; existing sessions are left alone. */
  startAll(reason: RunReason): string[] {
    const started: string[] = []
    log.info('Opening roll calls', { reason, channels: this.rollCallChannelIds.length })
    for (const channelId of this.rollCallChannelIds) {
      try {
        this.startSession(channelId, this.schedulerUserId)
        started.push(channelId)
      }
      catch (error) {
        log.warn('Roll call not started', { channelId, reason, error: errorMessage(error) })
      }
    }
    return started
  }

  endAll(reason: RunReason): RollCallSummary[] {
    const summaries: RollCallSummary[] = []
    const channelIds = this.store.activeChannelIds()
    log.info('Closing roll calls', { reason, channels: channelIds.length })
    for (const channelId of channelIds) {
      try {
        summaries.push(this.endSession(channelId))
      }
      catch (error) {
        log.warn('Roll call not ended', { channelId, reason, error: errorMessage(error) })
      }
    }
    return summaries
  }

  /** Reminds every responder who has not checked out yet. Returns the number of reminders queued. */
  sendReminders(): number {
    let queued = 0
    for (const channelId of this.store.activeChannelIds()) {
      const session = this.store.snapshot(channelId)
      const checkedOut = new Set(session.synced.check_out)
      const payload = this.messages.reminder({ channelId, autoCheckoutTime: this.autoCheckoutTime })
      for (const personId of session.responders) {
        if (checkedOut.has(personId)) continue
        queued += 1
        this.effects.run('Check-out reminder', () => this.delivery.sendDirect(personId, payload), { channelId, personId })
      }
    }
    log.info('Check-out reminders queued', { count: queued })
    return queued
  }

  /**
   * Routes a free-text chat message. Returns `null` when the channel has no
   * active roll call or the message carries no attendance intent.
   */
  async handleMessage(channelId: string, personId: string, text: string): Promise<MessageOutcome | null> {
    if (!this.store.isActive(channelId)) return null
    const intent = classifyMessage(text)
    switch (intent.kind) {
      case 'check_in':
        return { kind: 'check_in', outcome: await this.recordResponse(channelId, personId, intent.note) }
      case 'check_out':
        return { kind: 'check_out', outcome: await this.recordCheckout(channelId, personId) }
      case 'absent':
        return { kind: 'absent', outcome: await this.recordAbsence(channelId, personId, intent.reason) }
      case 'none':
        return null
    }
  }

  status(channelId: string): RollCallSession | null {
    if (!this.store.isActive(channelId)) return null
    return this.store.snapshot(channelId)
  }

  idle(): Promise<void> {
    return this.effects.idle()
  }

  private async recordAutoCheckout(channelId: string, identity: EmployeeIdentity): Promise<AutoCheckoutOutcome | undefined> {
    const at = this.autoCheckoutAt
    if (!at) return undefined

    let target: CivilTime | null
    try {
      target = sameDayAt(getZonedTime(this.timezone, this.clock()), at)
    }
    catch (error) {
      if (!(error instanceof TimezoneUnavailableError)) throw error
      log.warn('Automatic check-out skipped; timezone unavailable', { channelId, error })
      return { status: 'skipped', reason: error.message }
    }
    if (!target) {
      return { status: 'skipped', reason: `configured check-out time ${this.autoCheckoutTime} has already passed for today` }
    }
    if (!this.store.claimSync(channelId, identity.personId, 'check_out')) {
      return { status: 'skipped', reason: 'check-out already recorded' }
    }

    try {
      const timeRecorded = await this.sync.recordCheckOut(identity, target)
      this.commitSync(channelId, identity.personId, 'check_out')
      log.info('Automatic check-out recorded', { channelId, personId: identity.personId, time: timeRecorded })
      return { status: 'recorded', timeRecorded }
    }
    catch (error) {
      this.store.releaseSync(channelId, identity.personId, 'check_out')
      log.warn('Automatic check-out sync failed', { channelId, personId: identity.personId, error })
      return { status: 'failed', failure: errorMessage(error) }
    }
  }

  // The remote record exists either way; a session closed mid-call just keeps no local flag.
  private commitSync(channelId: string, personId: string, kind: SyncKind): void {
    try {
      this.store.markSynced(channelId, personId, kind)
    }
    catch (error) {
      log.warn('Sync succeeded after roll call closed; not marked locally', { channelId, personId, kind, error })
    }
  }

  private broadcast(payload: NotificationPayload): void {
    for (const channelId of this.notifyChannelIds) {
      this.effects.run('Roll call notification', () => this.delivery.postToChannel(channelId, payload), { channelId })
    }
  }

  private nowLabel(): string {
    return formatDateTime(resolveTime(this.timezone, this.clock(), log).time)
  }

  private dateLabel(): string {
    return formatDate(resolveTime(this.timezone, this.clock(), log).time)
  }

  private todayLabel(): string {
    return formatLongDate(resolveTime(this.timezone, this.clock(), log).time)
  }
}
