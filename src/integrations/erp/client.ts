import { z } from 'zod'
import type { AttendanceSyncClient, EmployeeIdentity } from '../../core/rollcall/types.js'
import { ConfigurationMissingError, SyncFailedError } from '../../core/rollcall/errors.js'
import type { CivilTime, Clock } from '../../utils/time.js'
import { formatDate, formatDateTime, resolveTime, systemClock } from '../../utils/time.js'
import { createLogger, errorMessage } from '../../utils/logger.js'
import { buildAbsenceDoc, buildCheckinDoc, SAVEDOCS_PATH } from './documents.js'
import type { AttendanceDoc, EmployeeCheckinDoc } from './documents.js'
import { hostnameAllowed, hostnameOf } from './hosts.js'

const log = createLogger('erp')

const savedocsResponseSchema = z.object({
  docs: z.array(z.object({ name: z.string() }).passthrough()).min(1),
}).passthrough()

export interface ErpClientOptions {
  domain?: string
  apiKey?: string
  apiSecret?: string
  owner: string
  timezone: string
  allowedHostnames: string[]
  timeoutMs: number
  clock?: Clock
}

interface ResolvedTarget {
  endpoint: URL
  token: string
}

function truncate(value: string, max = 300): string {
  return value.length > max ? `${value.slice(0, max)}...` : value
}

/**
 * Writes attendance documents through the Frappe `savedocs` endpoint. One
 * request per call, no retries: every failure surfaces as
 * {@link SyncFailedError} and the caller decides whether a later event
 * should try again.
 */
export class ErpClient implements AttendanceSyncClient {
  private readonly options: ErpClientOptions
  private readonly clock: Clock

  constructor(options: ErpClientOptions) {
    this.options = options
    this.clock = options.clock ?? systemClock
  }

  async recordCheckIn(identity: EmployeeIdentity): Promise<string> {
    const time = formatDateTime(this.now())
    await this.save(buildCheckinDoc(identity, 'IN', time, this.options.owner))
    log.debug('Employee check-in recorded', { employeeId: identity.employeeId, time })
    return time
  }

  async recordCheckOut(identity: EmployeeIdentity, at?: CivilTime): Promise<string> {
    const time = formatDateTime(at ?? this.now())
    await this.save(buildCheckinDoc(identity, 'OUT', time, this.options.owner))
    log.debug('Employee check-out recorded', { employeeId: identity.employeeId, time })
    return time
  }

  async recordAbsence(identity: EmployeeIdentity, reason: string): Promise<string> {
    const date = formatDate(this.now())
    await this.save(buildAbsenceDoc(identity, date, this.options.owner, reason))
    log.debug('Employee absence recorded', { employeeId: identity.employeeId, date })
    return date
  }

  private now(): CivilTime {
    return resolveTime(this.options.timezone, this.clock(), log).time
  }

  private resolveTarget(): ResolvedTarget {
    const { domain, apiKey, apiSecret } = this.options
    if (!domain) throw new ConfigurationMissingError('ERP domain')
    if (!apiKey) throw new ConfigurationMissingError('ERP API key')
    if (!apiSecret) throw new ConfigurationMissingError('ERP API secret')

    let endpoint: URL
    try {
      endpoint = new URL(`${domain.replace(/\/+$/, '')}${SAVEDOCS_PATH}`)
    }
    catch (error) {
      throw new SyncFailedError(`invalid ERP domain "${domain}"`, { cause: error })
    }

    const hostname = hostnameOf(endpoint)
    if (!hostnameAllowed(hostname, this.options.allowedHostnames)) {
      throw new SyncFailedError(`hostname "${hostname}" is not on the allowed list`)
    }

    return { endpoint, token: `${apiKey}:${apiSecret}` }
  }

  private async save(doc: EmployeeCheckinDoc | AttendanceDoc): Promise<void> {
    const { endpoint, token } = this.resolveTarget()
    const form = new FormData()
    form.append('doc', JSON.stringify(doc))
    form.append('action', 'Save')

    log.debug('ERP savedocs request', {
      method: 'POST',
      url: endpoint.toString(),
      doctype: doc.doctype,
      name: doc.name,
    })

    let response: Response
    let text: string
    try {
      response = await fetch(endpoint, {
        method: 'POST',
        headers: { authorization: `token ${token}` },
        body: form,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      })
      text = await response.text()
    }
    catch (error) {
      throw new SyncFailedError(`request failed: ${errorMessage(error)}`, { cause: error })
    }

    log.debug('ERP savedocs response', { status: response.status, ok: response.ok })

    if (!response.ok) {
      throw new SyncFailedError(`HTTP ${response.status}: ${truncate(text)}`)
    }

    let payload: unknown
    try {
      payload = JSON.parse(text)
    }
    catch {
      throw new SyncFailedError('response is not JSON')
    }

    const parsed = savedocsResponseSchema.safeParse(payload)
    if (!parsed.success) {
      throw new SyncFailedError('unexpected response shape')
    }
  }
}
