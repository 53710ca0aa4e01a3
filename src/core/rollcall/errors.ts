export type RollCallErrorCode =
  | 'already_active'
  | 'no_active_session'
  | 'session_closed'
  | 'not_responded'
  | 'no_such_session'
  | 'session_not_found'
  | 'sync_failed'
  | 'timezone_unavailable'
  | 'configuration_missing'
  | 'identity_not_found'

export class RollCallError extends Error {
  readonly code: RollCallErrorCode

  constructor(code: RollCallErrorCode, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

export type ConflictReason = 'already_active' | 'no_active_session' | 'session_closed' | 'not_responded'

const CONFLICT_MESSAGES: Record<ConflictReason, string> = {
  already_active: 'A roll call is already active in this channel',
  no_active_session: 'There is no active roll call in this channel',
  session_closed: 'The roll call in this channel has already ended',
  not_responded: 'You have not checked in to the roll call in this channel',
}

/** A session-state precondition did not hold. Shown to the caller, never retried. */
export class RollCallConflictError extends RollCallError {
  readonly channelId: string

  constructor(reason: ConflictReason, channelId: string) {
    super(reason, CONFLICT_MESSAGES[reason])
    this.channelId = channelId
  }
}

export class NoSuchSessionError extends RollCallError {
  constructor(readonly channelId: string) {
    super('no_such_session', `No roll call exists for channel ${channelId}`)
  }
}

export class SessionNotFoundError extends RollCallError {
  constructor(readonly channelId: string) {
    super('session_not_found', `No roll call found for channel ${channelId}`)
  }
}

export class SyncFailedError extends RollCallError {
  constructor(readonly reason: string, options?: ErrorOptions) {
    super('sync_failed', `External sync failed: ${reason}`, options)
  }
}

export class TimezoneUnavailableError extends RollCallError {
  constructor(readonly timeZone: string, options?: ErrorOptions) {
    super('timezone_unavailable', `Timezone "${timeZone}" is unavailable`, options)
  }
}

export class ConfigurationMissingError extends RollCallError {
  constructor(readonly field: string) {
    super('configuration_missing', `${field} is not configured`)
  }
}

export class IdentityNotFoundError extends RollCallError {
  constructor(readonly personId: string, detail?: string) {
    super('identity_not_found', detail ? `Identity not found for ${personId}: ${detail}` : `Identity not found for ${personId}`)
  }
}
