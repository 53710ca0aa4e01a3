import type { MessageClassification } from './types.js'

const CHECK_IN_PHRASES = ['present', 'checking in', 'check in', 'here']
const CHECK_OUT_PHRASES = ['checking out', 'check out', 'leaving']
const ABSENT_PHRASES = ['absent', "won't be in", 'out sick']

const LEADING_PUNCTUATION = /^[\s:,.!?-]+/

// Index of the first character after the matched phrase in `text`, or -1.
function findPhrase(text: string, phrases: string[]): number {
  for (const phrase of phrases) {
    const pattern = new RegExp(`(^|[^a-z])(${phrase.replace(/'/g, "['’]")})(?=$|[^a-z])`, 'i')
    const match = pattern.exec(text)
    if (match) {
      return match.index + match[0].length
    }
  }
  return -1
}

function trailingText(text: string, end: number): string | undefined {
  const rest = text.slice(end).replace(LEADING_PUNCTUATION, '').trim()
  return rest.length > 0 ? rest : undefined
}

/**
 * Maps a free-text chat message to an attendance intent. Check-in phrases
 * are tried first, then check-out, then absence, so "present, leaving at
 * 4pm" is a check-in with the rest as its note.
 */
export function classifyMessage(text: string): MessageClassification {
  const checkIn = findPhrase(text, CHECK_IN_PHRASES)
  if (checkIn >= 0) {
    return { kind: 'check_in', note: trailingText(text, checkIn) }
  }

  const checkOut = findPhrase(text, CHECK_OUT_PHRASES)
  if (checkOut >= 0) {
    return { kind: 'check_out', note: trailingText(text, checkOut) }
  }

  const absent = findPhrase(text, ABSENT_PHRASES)
  if (absent >= 0) {
    return { kind: 'absent', reason: trailingText(text, absent) }
  }

  return { kind: 'none' }
}
