import { describe, it, expect, vi, beforeEach } from 'vitest'
import cron from 'node-cron'
import { RollCallScheduler } from '../../../src/core/scheduler/service.js'
import type { Trigger, TriggerHandlers } from '../../../src/core/scheduler/service.js'

vi.mock('node-cron', () => {
  const schedule = vi.fn(() => ({ stop: vi.fn() }))
  return { default: { schedule } }
})

function createHandlers() {
  return {
    'open-all': vi.fn(() => undefined),
    'close-all': vi.fn(() => undefined),
    'reminder-sweep': vi.fn(() => undefined),
  } satisfies TriggerHandlers
}

const TRIGGERS: Trigger[] = [
  { time: '09:00:00', action: 'open-all' },
  { time: '17:00:00', action: 'reminder-sweep' },
  { time: '17:30:00', action: 'close-all' },
]

// Asia/Ho_Chi_Minh is UTC+7 with no daylight saving.
const at = (utc: string) => new Date(`2024-03-04T${utc}Z`)

describe('RollCallScheduler', () => {
  let handlers: ReturnType<typeof createHandlers>

  beforeEach(() => {
    vi.mocked(cron.schedule).mockClear()
    handlers = createHandlers()
  })

  function createScheduler(timezone = 'Asia/Ho_Chi_Minh', now = at('02:00:00')): RollCallScheduler {
    return new RollCallScheduler({ timezone, triggers: TRIGGERS, handlers, clock: () => now })
  }

  describe('tick', () => {
    it('fires the trigger whose time matches the current minute', async () => {
      const scheduler = createScheduler()

      expect(scheduler.tick(at('02:00:00'))).toEqual(['open-all'])
      await scheduler.idle()

      expect(handlers['open-all']).toHaveBeenCalledTimes(1)
      expect(handlers['close-all']).not.toHaveBeenCalled()
    })

    it('ignores the seconds of the tick', () => {
      const scheduler = createScheduler()

      expect(scheduler.tick(at('10:30:42'))).toEqual(['close-all'])
    })

    it('fires once across the minutes around a trigger', async () => {
      const scheduler = createScheduler()

      const fired = ['01:59:00', '02:00:00', '02:01:00'].flatMap(time => scheduler.tick(at(time)))
      await scheduler.idle()

      expect(fired).toEqual(['open-all'])
      expect(handlers['open-all']).toHaveBeenCalledTimes(1)
    })

    it('never fires when no trigger matches', async () => {
      const scheduler = createScheduler()

      for (let minute = 0; minute < 60; minute += 1) {
        const date = new Date(Date.UTC(2024, 2, 4, 3, minute))
        expect(scheduler.tick(date)).toEqual([])
      }
      await scheduler.idle()

      expect(handlers['open-all']).not.toHaveBeenCalled()
      expect(handlers['reminder-sweep']).not.toHaveBeenCalled()
      expect(handlers['close-all']).not.toHaveBeenCalled()
    })

    it('skips ticks when the timezone cannot be resolved', async () => {
      const scheduler = createScheduler('Not/AZone')

      expect(scheduler.tick(at('02:00:00'))).toEqual([])
      await scheduler.idle()

      expect(handlers['open-all']).not.toHaveBeenCalled()
    })

    it('keeps running after a handler fails', async () => {
      handlers['open-all'].mockImplementationOnce(() => {
        throw new Error('delivery down')
      })
      const scheduler = createScheduler()

      scheduler.tick(at('02:00:00'))
      await scheduler.idle()

      expect(scheduler.tick(at('10:00:00'))).toEqual(['reminder-sweep'])
      await scheduler.idle()
      expect(handlers['reminder-sweep']).toHaveBeenCalledTimes(1)
    })

    it('fires every trigger that shares a time', () => {
      const scheduler = new RollCallScheduler({
        timezone: 'Asia/Ho_Chi_Minh',
        triggers: [
          { time: '09:00:00', action: 'close-all' },
          { time: '09:00:00', action: 'open-all' },
        ],
        handlers,
      })

      expect(scheduler.tick(at('02:00:00'))).toEqual(['close-all', 'open-all'])
    })
  })

  describe('start and stop', () => {
    it('schedules a single minute tick', () => {
      const scheduler = createScheduler()

      scheduler.start()
      scheduler.start()

      expect(cron.schedule).toHaveBeenCalledTimes(1)
      expect(vi.mocked(cron.schedule).mock.calls[0]?.[0]).toBe('* * * * *')
      expect(scheduler.isRunning()).toBe(true)
    })

    it('runs a tick from the cron callback using the clock', async () => {
      const scheduler = createScheduler('Asia/Ho_Chi_Minh', at('02:00:00'))
      scheduler.start()

      const callback = vi.mocked(cron.schedule).mock.calls[0]?.[1]
      expect(typeof callback).toBe('function')
      if (typeof callback === 'function') callback(new Date())
      await scheduler.idle()

      expect(handlers['open-all']).toHaveBeenCalledTimes(1)
    })

    it('stops the task and can be stopped twice', () => {
      const scheduler = createScheduler()
      scheduler.start()
      const task = vi.mocked(cron.schedule).mock.results[0]?.value

      scheduler.stop()
      scheduler.stop()

      expect(task?.stop).toHaveBeenCalledTimes(1)
      expect(scheduler.isRunning()).toBe(false)
    })

    it('can be restarted after stopping', () => {
      const scheduler = createScheduler()

      scheduler.start()
      scheduler.stop()
      scheduler.start()

      expect(cron.schedule).toHaveBeenCalledTimes(2)
      expect(scheduler.isRunning()).toBe(true)
    })
  })
})
