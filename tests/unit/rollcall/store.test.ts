import { describe, it, expect, beforeEach } from 'vitest'
import { SessionStore } from '../../../src/core/rollcall/store.js'
import {
  NoSuchSessionError,
  RollCallConflictError,
  SessionNotFoundError,
} from '../../../src/core/rollcall/errors.js'

describe('SessionStore', () => {
  let now: Date
  let store: SessionStore

  beforeEach(() => {
    now = new Date('2024-03-04T01:00:00.000Z')
    store = new SessionStore(() => now)
  })

  describe('open', () => {
    it('creates an active session with no responses', () => {
      const session = store.open('C1', 'U0')

      expect(session.channelId).toBe('C1')
      expect(session.initiatorId).toBe('U0')
      expect(session.active).toBe(true)
      expect(session.responseCount).toBe(0)
      expect(session.responders).toEqual([])
      expect(session.startedAt.toISOString()).toBe('2024-03-04T01:00:00.000Z')
      expect(store.isActive('C1')).toBe(true)
    })

    it('rejects a second open while the first is active', () => {
      store.open('C1', 'U0')

      expect(() => store.open('C1', 'U1')).toThrow(RollCallConflictError)
      try {
        store.open('C1', 'U1')
      }
      catch (error) {
        expect(error).toMatchObject({ code: 'already_active', channelId: 'C1' })
      }
    })

    it('keeps the existing session when a second open is rejected', () => {
      store.open('C1', 'U0')
      store.respond('C1', 'U1')
      now = new Date('2024-03-04T02:00:00.000Z')

      expect(() => store.open('C1', 'U2')).toThrow(RollCallConflictError)

      const session = store.snapshot('C1')
      expect(session.startedAt.toISOString()).toBe('2024-03-04T01:00:00.000Z')
      expect(session.initiatorId).toBe('U0')
      expect(session.responders).toEqual(['U1'])
      expect(session.responseCount).toBe(1)
    })

    it('replaces a closed session with a fresh one', () => {
      store.open('C1', 'U0')
      store.respond('C1', 'U1')
      store.close('C1')

      const reopened = store.open('C1', 'U2')

      expect(reopened.responseCount).toBe(0)
      expect(reopened.initiatorId).toBe('U2')
      expect(store.hasResponded('C1', 'U1')).toBe(false)
    })

    it('keeps channels independent', () => {
      store.open('C1', 'U0')
      store.open('C2', 'U0')

      expect(store.activeChannelIds()).toEqual(['C1', 'C2'])
    })
  })

  describe('respond', () => {
    it('counts each responder once', () => {
      store.open('C1', 'U0')

      const first = store.respond('C1', 'U1')
      const second = store.respond('C1', 'U1')
      const other = store.respond('C1', 'U2')

      expect(first.isNewResponse).toBe(true)
      expect(second.isNewResponse).toBe(false)
      expect(other.isNewResponse).toBe(true)
      expect(other.session.responseCount).toBe(2)
      expect(other.session.responders).toEqual(['U1', 'U2'])
    })

    it('stores the latest non-empty note, trimmed', () => {
      store.open('C1', 'U0')

      store.respond('C1', 'U1', '  working from home ')
      store.respond('C1', 'U1', '   ')

      expect(store.snapshot('C1').notes).toEqual({ U1: 'working from home' })

      store.respond('C1', 'U1', 'at the office')
      expect(store.snapshot('C1').notes).toEqual({ U1: 'at the office' })
    })

    it('fails without an active session', () => {
      expect(() => store.respond('C1', 'U1')).toThrow('There is no active roll call in this channel')

      store.open('C1', 'U0')
      store.close('C1')
      expect(() => store.respond('C1', 'U1')).toThrow(RollCallConflictError)
    })
  })

  describe('sync claims', () => {
    beforeEach(() => {
      store.open('C1', 'U0')
      store.respond('C1', 'U1')
    })

    it('grants one claim at a time per person and kind', () => {
      expect(store.claimSync('C1', 'U1', 'check_in')).toBe(true)
      expect(store.claimSync('C1', 'U1', 'check_in')).toBe(false)
      expect(store.claimSync('C1', 'U1', 'check_out')).toBe(true)
    })

    it('allows a new claim after a release', () => {
      store.claimSync('C1', 'U1', 'check_in')
      store.releaseSync('C1', 'U1', 'check_in')

      expect(store.claimSync('C1', 'U1', 'check_in')).toBe(true)
    })

    it('refuses claims once the person is synced', () => {
      store.claimSync('C1', 'U1', 'check_in')
      store.markSynced('C1', 'U1', 'check_in')

      expect(store.isSynced('C1', 'U1', 'check_in')).toBe(true)
      expect(store.claimSync('C1', 'U1', 'check_in')).toBe(false)
      expect(store.snapshot('C1').synced.check_in).toEqual(['U1'])
    })

    it('refuses claims on closed or unknown sessions', () => {
      store.close('C1')

      expect(store.claimSync('C1', 'U1', 'check_in')).toBe(false)
      expect(store.claimSync('C9', 'U1', 'check_in')).toBe(false)
    })

    it('rejects markSynced for unknown and closed sessions', () => {
      expect(() => store.markSynced('C9', 'U1', 'check_in')).toThrow(NoSuchSessionError)

      store.close('C1')
      expect(() => store.markSynced('C1', 'U1', 'check_in')).toThrow('The roll call in this channel has already ended')
    })
  })

  describe('close', () => {
    it('records the end time and deactivates the session', () => {
      store.open('C1', 'U0')
      now = new Date('2024-03-04T02:30:00.000Z')

      const closed = store.close('C1')

      expect(closed.active).toBe(false)
      expect(closed.endedAt?.toISOString()).toBe('2024-03-04T02:30:00.000Z')
      expect(store.activeChannelIds()).toEqual([])
    })

    it('fails when nothing is active', () => {
      expect(() => store.close('C1')).toThrow(RollCallConflictError)
      store.open('C1', 'U0')
      store.close('C1')
      expect(() => store.close('C1')).toThrow(RollCallConflictError)
    })
  })

  describe('snapshot', () => {
    it('returns copies that do not alias store state', () => {
      store.open('C1', 'U0')
      store.respond('C1', 'U1')

      const copy = store.snapshot('C1')
      copy.responders.push('U9')
      copy.synced.check_in.push('U9')
      copy.notes.U9 = 'injected'

      const fresh = store.snapshot('C1')
      expect(fresh.responders).toEqual(['U1'])
      expect(fresh.synced.check_in).toEqual([])
      expect(fresh.notes).toEqual({})
    })

    it('throws for unknown channels', () => {
      expect(() => store.snapshot('C9')).toThrow(SessionNotFoundError)
    })

    it('still returns closed sessions until removed', () => {
      store.open('C1', 'U0')
      store.close('C1')

      expect(store.snapshot('C1').active).toBe(false)
      expect(store.remove('C1')).toBe(true)
      expect(() => store.snapshot('C1')).toThrow(SessionNotFoundError)
    })
  })
})
