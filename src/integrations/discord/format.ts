import { EmbedBuilder } from 'discord.js'
import type { APIEmbed } from 'discord.js'
import type { RollCallMessages } from '../../core/rollcall/service.js'
import type {
  AbsenceOutcome,
  ResponseOutcome,
  RollCallSession,
  RollCallSummary,
  SummaryEntry,
  SyncOutcome,
} from '../../core/rollcall/types.js'

const COLOR_SUCCESS = 0x2f9e44
const COLOR_WARN = 0xf08c00
const EMBED_AUTHOR_NAME = 'Roll Call'
const FIELD_LIMIT = 1024
const SYNC_WARNING = '⚠️ There was an issue recording this in the HR system. An administrator has been notified.'

export function getWebhookIdentity(): { username: string } {
  return { username: EMBED_AUTHOR_NAME }
}

export function mention(personId: string): string {
  return `<@${personId}>`
}

function clampField(lines: string[], fallback: string): string {
  if (lines.length === 0) return fallback
  let value = ''
  for (const [index, line] of lines.entries()) {
    const next = value ? `${value}\n${line}` : line
    if (next.length > FIELD_LIMIT - 20) {
      return `${value}\n…and ${lines.length - index} more`
    }
    value = next
  }
  return value
}

function formatEntry(entry: SummaryEntry): string {
  const marks: string[] = []
  if (entry.checkInSynced) marks.push('✓ check-in')
  if (entry.checkOutSynced) marks.push('✓ check-out')
  if (!entry.checkInSynced) marks.push('⚠️ not recorded in HR')
  const note = entry.note ? ` (${entry.note})` : ''
  return `- ${mention(entry.personId)}${note} ${marks.join(' ')}`
}

export function buildSummaryEmbed(summary: RollCallSummary): APIEmbed {
  const unrecorded = summary.entries.filter(entry => !entry.checkInSynced).length
  return new EmbedBuilder()
    .setTitle(`📋 Daily Roll Call Summary - ${summary.date}`)
    .setAuthor({ name: EMBED_AUTHOR_NAME })
    .setColor(unrecorded > 0 ? COLOR_WARN : COLOR_SUCCESS)
    .addFields(
      { name: 'Active Period', value: summary.durationLabel, inline: true },
      { name: 'Total Responses', value: String(summary.responseCount), inline: true },
      { name: 'HR Records', value: `${summary.checkInCount} check-ins, ${summary.checkOutCount} check-outs`, inline: true },
      {
        name: 'Members Present',
        value: clampField(summary.entries.map(formatEntry), 'No members have responded today.'),
        inline: false,
      },
    )
    .setTimestamp(new Date(summary.endedAt))
    .toJSON()
}

export function buildAnnouncement(input: { date: string; autoCheckoutTime?: string }): string {
  const lines = [
    `# 📋 Daily Roll Call - ${input.date}`,
    '',
    'Good morning team! Reply with **present** (or use `/checkin`) to mark your attendance for today.',
    '',
    '- Your attendance will be recorded in the HR system automatically',
  ]
  if (input.autoCheckoutTime) {
    lines.push(`- Automatic check-out will be recorded at ${input.autoCheckoutTime}`)
  }
  lines.push('- Reply with **absent** and a reason if you are away today')
  return lines.join('\n')
}

export const discordRollCallMessages: RollCallMessages = {
  announcement: buildAnnouncement,
  summary: summary => ({ embeds: [buildSummaryEmbed(summary)] }),
  checkInNotice: (name, time) => `**${name}** has checked in at ${time}`,
  checkOutNotice: (name, time) => `**${name}** has checked out at ${time}`,
  absenceNotice: (name, reason) => `**${name}** has reported absence for today: "${reason}"`,
  reminder: ({ channelId, autoCheckoutTime }) => autoCheckoutTime
    ? `⏰ Your check-out for the roll call in <#${channelId}> will be recorded at ${autoCheckoutTime}. Reply **leaving** there if you head out earlier.`
    : `⏰ Don't forget to check out: reply **leaving** in <#${channelId}> or use \`/checkout\` before you go.`,
}

export function formatResponseReply(outcome: ResponseOutcome): string {
  if (outcome.alreadyRecorded) {
    return outcome.note
      ? `ℹ️ You are already checked in. Your note is now: "${outcome.note}"`
      : 'ℹ️ You are already checked in to this roll call.'
  }

  const lines: string[] = []
  lines.push(outcome.note
    ? `✅ Your attendance has been recorded at **${outcome.timeRecorded}** with note: "${outcome.note}"`
    : `✅ Your attendance has been recorded at **${outcome.timeRecorded}**!`)

  if (outcome.failure) {
    lines.push(SYNC_WARNING)
  }
  else if (!outcome.synced) {
    lines.push('ℹ️ Your HR check-in is still being recorded.')
  }

  const checkOut = outcome.checkOut
  if (checkOut?.status === 'recorded') {
    lines.push(`✅ Check-out scheduled in the HR system for **${checkOut.timeRecorded}**.`)
  }
  else if (checkOut?.status === 'failed') {
    lines.push('⚠️ There was an issue recording your automatic check-out. An administrator has been notified.')
  }
  else if (checkOut?.status === 'skipped') {
    lines.push(`ℹ️ No automatic check-out scheduled: ${checkOut.reason}`)
  }
  return lines.join('\n')
}

export function formatCheckoutReply(outcome: SyncOutcome): string {
  if (outcome.alreadyRecorded) {
    return 'ℹ️ Your check-out has already been recorded.'
  }
  if (!outcome.synced) {
    return outcome.failure ? SYNC_WARNING : 'ℹ️ Your check-out is still being recorded.'
  }
  return `✅ Your check-out has been recorded in the HR system at **${outcome.timeRecorded}**!`
}

export function formatAbsenceReply(outcome: AbsenceOutcome): string {
  const base = `📝 Your absence has been noted for **${outcome.date}** with reason: "${outcome.reason}"`
  if (outcome.alreadyRecorded) return `${base} (already recorded)`
  if (!outcome.synced) return `${base}\n${outcome.failure ? SYNC_WARNING : 'ℹ️ Still being recorded.'}`
  return base
}

export function formatStatusReply(session: RollCallSession | null): string {
  if (!session) return 'There is no active roll call in this channel.'
  const startedAt = Math.floor(session.startedAt.getTime() / 1000)
  return [
    `📋 Roll call active since <t:${startedAt}:t> (started by ${mention(session.initiatorId)})`,
    `Responses: **${session.responseCount}**`,
    `HR check-ins: **${session.synced.check_in.length}**, check-outs: **${session.synced.check_out.length}**`,
  ].join('\n')
}
