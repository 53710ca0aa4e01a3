import type { Logger } from '../../utils/logger.js'
import { logger as rootLogger } from '../../utils/logger.js'

/**
 * Follow-up work that may finish after the call that started it returns
 * (announcements, broadcasts, archive writes). Failures are logged per
 * effect; {@link idle} lets callers and tests wait for everything started so
 * far.
 */
export class EffectTracker {
  private readonly pending = new Set<Promise<void>>()
  private readonly log: Logger

  constructor(log: Logger = rootLogger) {
    this.log = log
  }

  run(label: string, effect: () => Promise<unknown>, meta?: Record<string, unknown>): void {
    const tracked = Promise.resolve()
      .then(effect)
      .then(
        () => undefined,
        (error: unknown) => {
          this.log.warn(`${label} failed`, { ...meta, error })
        },
      )
      .finally(() => {
        this.pending.delete(tracked)
      })
    this.pending.add(tracked)
  }

  async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled(Array.from(this.pending))
    }
  }
}
