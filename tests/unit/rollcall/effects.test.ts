import { describe, it, expect, vi } from 'vitest'
import { EffectTracker } from '../../../src/core/rollcall/effects.js'
import type { Logger } from '../../../src/utils/logger.js'

function createLog() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger
}

describe('EffectTracker', () => {
  it('waits for running effects', async () => {
    const tracker = new EffectTracker(createLog())
    const done: string[] = []

    tracker.run('first', async () => {
      await new Promise(resolve => setTimeout(resolve, 5))
      done.push('first')
    })
    tracker.run('second', async () => {
      done.push('second')
    })

    await tracker.idle()

    expect(done.sort()).toEqual(['first', 'second'])
  })

  it('logs failures with their metadata', async () => {
    const log = createLog()
    const tracker = new EffectTracker(log)
    const error = new Error('boom')

    tracker.run('Roll call announcement', async () => {
      throw error
    }, { channelId: 'C1' })
    await tracker.idle()

    expect(log.warn).toHaveBeenCalledWith('Roll call announcement failed', { channelId: 'C1', error })
  })

  it('waits for effects started while idling', async () => {
    const tracker = new EffectTracker(createLog())
    const done: string[] = []

    tracker.run('outer', async () => {
      tracker.run('inner', async () => {
        done.push('inner')
      })
    })
    await tracker.idle()

    expect(done).toEqual(['inner'])
  })
})
