import { describe, it, expect } from 'vitest'
import { classifyMessage } from '../../../src/core/rollcall/classifier.js'

describe('classifyMessage', () => {
  it('detects check-in phrases', () => {
    expect(classifyMessage('present')).toEqual({ kind: 'check_in' })
    expect(classifyMessage('HERE!')).toEqual({ kind: 'check_in' })
    expect(classifyMessage('Checking in from the train')).toEqual({ kind: 'check_in', note: 'from the train' })
  })

  it('keeps the trailing text as a note', () => {
    expect(classifyMessage('Present - working from home')).toEqual({
      kind: 'check_in',
      note: 'working from home',
    })
  })

  it('detects check-out phrases', () => {
    expect(classifyMessage('leaving')).toEqual({ kind: 'check_out' })
    expect(classifyMessage('Checking out, see you tomorrow')).toEqual({
      kind: 'check_out',
      note: 'see you tomorrow',
    })
  })

  it('detects absence with a reason', () => {
    expect(classifyMessage('absent: dentist appointment')).toEqual({
      kind: 'absent',
      reason: 'dentist appointment',
    })
    expect(classifyMessage("I won't be in today")).toEqual({ kind: 'absent', reason: 'today' })
    expect(classifyMessage('Out sick')).toEqual({ kind: 'absent' })
  })

  it('prefers check-in over check-out and absence', () => {
    expect(classifyMessage('Present, leaving at 4pm for the dentist')).toEqual({
      kind: 'check_in',
      note: 'leaving at 4pm for the dentist',
    })
    expect(classifyMessage('present today, absent tomorrow')).toEqual({
      kind: 'check_in',
      note: 'today, absent tomorrow',
    })
  })

  it('prefers check-out over absence', () => {
    expect(classifyMessage('leaving early, absent tomorrow')).toEqual({
      kind: 'check_out',
      note: 'early, absent tomorrow',
    })
  })

  it('takes the note from the original text when case folding changes its length', () => {
    expect(classifyMessage('İİİ present today')).toEqual({ kind: 'check_in', note: 'today' })
  })

  it('ignores phrases embedded in other words', () => {
    expect(classifyMessage('presentation at 3')).toEqual({ kind: 'none' })
    expect(classifyMessage('over there')).toEqual({ kind: 'none' })
    expect(classifyMessage('good morning')).toEqual({ kind: 'none' })
  })
})
