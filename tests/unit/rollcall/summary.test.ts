import { describe, it, expect } from 'vitest'
import { SessionStore } from '../../../src/core/rollcall/store.js'
import { buildSummary, unrecordedEntries } from '../../../src/core/rollcall/summary.js'

describe('buildSummary', () => {
  it('summarises a session opened, answered twice by one person and closed', () => {
    let now = new Date('2024-03-04T01:00:00.000Z')
    const store = new SessionStore(() => now)
    store.open('C1', 'U1')

    expect(store.respond('C1', 'U2').isNewResponse).toBe(true)
    expect(store.respond('C1', 'U2').isNewResponse).toBe(false)
    now = new Date('2024-03-04T02:01:01.000Z')
    const closed = store.close('C1')

    const summary = buildSummary(closed, 'Monday, March 4, 2024')

    expect(summary.responseCount).toBe(1)
    expect(summary.durationLabel).toBe('1h 1m 1s')
    expect(summary.entries).toEqual([
      { personId: 'U2', responded: true, checkInSynced: false, checkOutSynced: false },
    ])
    expect(unrecordedEntries(summary).map(entry => entry.personId)).toEqual(['U2'])
  })

  it('keeps the original start when a second open is rejected', () => {
    let now = new Date('2024-03-04T01:00:00.000Z')
    const store = new SessionStore(() => now)
    store.open('C1', 'U1')
    now = new Date('2024-03-04T05:00:00.000Z')

    expect(() => store.open('C1', 'U3')).toThrow()

    const session = store.snapshot('C1')
    expect(session.startedAt.toISOString()).toBe('2024-03-04T01:00:00.000Z')
    expect(session.initiatorId).toBe('U1')
  })

  it('counts synced check-ins and check-outs', () => {
    const store = new SessionStore(() => new Date('2024-03-04T01:00:00.000Z'))
    store.open('C1', 'U0')
    store.respond('C1', 'U1')
    store.respond('C1', 'U2')
    store.markSynced('C1', 'U1', 'check_in')
    store.markSynced('C1', 'U1', 'check_in')
    store.markSynced('C1', 'U1', 'check_out')
    store.markSynced('C1', 'U2', 'check_in')

    const summary = buildSummary(store.close('C1'), '2024-03-04')

    expect(summary.checkInCount).toBe(2)
    expect(summary.checkOutCount).toBe(1)
    expect(unrecordedEntries(summary)).toEqual([])
  })
})
