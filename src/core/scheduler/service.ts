import cron from 'node-cron'
import type { ScheduledTask } from 'node-cron'
import { EffectTracker } from '../rollcall/effects.js'
import { TimezoneUnavailableError } from '../rollcall/errors.js'
import type { Clock } from '../../utils/time.js'
import { formatTriggerClock, getZonedTime, systemClock } from '../../utils/time.js'
import { createLogger } from '../../utils/logger.js'

const log = createLogger('scheduler')

export type TriggerAction = 'open-all' | 'close-all' | 'reminder-sweep'

export interface Trigger {
  /** `HH:MM:00`, compared verbatim against the current minute. */
  time: string
  action: TriggerAction
}

export type TriggerHandlers = Record<TriggerAction, () => unknown>

export interface SchedulerOptions {
  timezone: string
  triggers: Trigger[]
  handlers: TriggerHandlers
  clock?: Clock
  effects?: EffectTracker
  tickSchedule?: string
}

/**
 * Fires roll-call actions at configured times of day in a fixed timezone.
 *
 * A node-cron task ticks every minute; each tick formats "now" as
 * `HH:MM:00` in the target zone and fires every trigger whose time matches
 * exactly. Ticks never fall back to local time: an unresolvable zone skips
 * the tick. A stall that spans a trigger minute misses that day's firing.
 */
export class RollCallScheduler {
  private readonly timezone: string
  private readonly triggers: Trigger[]
  private readonly handlers: TriggerHandlers
  private readonly clock: Clock
  private readonly effects: EffectTracker
  private readonly tickSchedule: string
  private task: ScheduledTask | null = null

  constructor(options: SchedulerOptions) {
    this.timezone = options.timezone
    this.triggers = options.triggers
    this.handlers = options.handlers
    this.clock = options.clock ?? systemClock
    this.effects = options.effects ?? new EffectTracker(log)
    this.tickSchedule = options.tickSchedule ?? '* * * * *'
  }

  start(): void {
    if (this.task) {
      log.debug('Scheduler already running')
      return
    }

    log.info('Scheduler starting', {
      timezone: this.timezone,
      triggers: this.triggers.map(trigger => `${trigger.action}@${trigger.time}`),
    })
    this.task = cron.schedule(this.tickSchedule, () => {
      this.tick()
    })
    log.info('Scheduler started')
  }

  /**
   * Cancels the tick task. Ticks run synchronously, so none is in progress
   * once this returns; actions already fired keep running (see {@link idle}).
   */
  stop(): void {
    if (!this.task) return
    this.task.stop()
    this.task = null
    log.info('Scheduler stopped')
  }

  isRunning(): boolean {
    return this.task !== null
  }

  /** Runs one comparison against `now`. Returns the actions fired. */
  tick(now: Date = this.clock()): TriggerAction[] {
    let current: string
    try {
      current = formatTriggerClock(getZonedTime(this.timezone, now))
    }
    catch (error) {
      if (!(error instanceof TimezoneUnavailableError)) throw error
      log.error('Scheduler tick skipped; timezone unavailable', { timezone: this.timezone, error })
      return []
    }

    const fired: TriggerAction[] = []
    for (const trigger of this.triggers) {
      if (trigger.time !== current) continue
      fired.push(trigger.action)
      log.info('Scheduled action triggered', { action: trigger.action, time: current })
      const handler = this.handlers[trigger.action]
      this.effects.run(`Scheduled ${trigger.action}`, async () => handler(), { action: trigger.action })
    }
    return fired
  }

  /** Resolves once every fired action has settled. */
  idle(): Promise<void> {
    return this.effects.idle()
  }
}
