import type { CivilTime } from '../../utils/time.js'

export type SyncKind = 'check_in' | 'check_out' | 'absence'

/** Read-only copy of a session handed out by the store. */
export interface RollCallSession {
  channelId: string
  initiatorId: string
  startedAt: Date
  endedAt?: Date
  active: boolean
  responseCount: number
  responders: string[]
  notes: Record<string, string>
  synced: Record<SyncKind, string[]>
}

export interface RespondResult {
  session: RollCallSession
  isNewResponse: boolean
}

export interface SummaryEntry {
  personId: string
  responded: boolean
  checkInSynced: boolean
  checkOutSynced: boolean
  note?: string
}

export interface RollCallSummary {
  channelId: string
  initiatorId: string
  startedAt: string
  endedAt: string
  durationMs: number
  durationLabel: string
  date: string
  responseCount: number
  checkInCount: number
  checkOutCount: number
  entries: SummaryEntry[]
}

export interface EmployeeIdentity {
  personId: string
  displayName: string
  employeeId: string
}

export interface IdentityResolver {
  resolve(personId: string): Promise<EmployeeIdentity>
}

export type RunReason = 'scheduled' | 'manual'

export type MessageClassification =
  | { kind: 'check_in'; note?: string }
  | { kind: 'check_out'; note?: string }
  | { kind: 'absent'; reason?: string }
  | { kind: 'none' }

export interface AttendanceSyncClient {
  /** Returns the `YYYY-MM-DD HH:MM:SS` time written to the record. */
  recordCheckIn(identity: EmployeeIdentity): Promise<string>
  /** `at` defaults to now in the configured timezone. */
  recordCheckOut(identity: EmployeeIdentity, at?: CivilTime): Promise<string>
  /** Returns the `YYYY-MM-DD` date the absence was recorded for. */
  recordAbsence(identity: EmployeeIdentity, reason: string): Promise<string>
}

export interface SyncOutcome {
  synced: boolean
  timeRecorded: string
  alreadyRecorded?: boolean
  failure?: string
}

export type AutoCheckoutOutcome =
  | { status: 'recorded'; timeRecorded: string }
  | { status: 'failed'; failure: string }
  | { status: 'skipped'; reason: string }

export interface ResponseOutcome extends SyncOutcome {
  isNewResponse: boolean
  note?: string
  checkOut?: AutoCheckoutOutcome
}

export interface AbsenceOutcome {
  synced: boolean
  date: string
  reason: string
  alreadyRecorded?: boolean
  failure?: string
}

export type MessageOutcome =
  | { kind: 'check_in'; outcome: ResponseOutcome }
  | { kind: 'check_out'; outcome: SyncOutcome }
  | { kind: 'absent'; outcome: AbsenceOutcome }
