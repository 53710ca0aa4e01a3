import type { RollCallService } from '../../core/rollcall/service.js'
import type { MessageOutcome } from '../../core/rollcall/types.js'
import { RollCallConflictError } from '../../core/rollcall/errors.js'
import {
  formatAbsenceReply,
  formatCheckoutReply,
  formatResponseReply,
  formatStatusReply,
} from './format.js'

export interface CommandInput {
  commandName: string
  subcommand?: string | null
  channelId: string
  userId: string
  note?: string | null
  reason?: string | null
}

export interface ChatMessageInput {
  channelId: string
  userId: string
  content: string
}

export function formatMessageOutcome(result: MessageOutcome): string {
  switch (result.kind) {
    case 'check_in':
      return formatResponseReply(result.outcome)
    case 'check_out':
      return formatCheckoutReply(result.outcome)
    case 'absent':
      return formatAbsenceReply(result.outcome)
  }
}

async function dispatchCommand(service: RollCallService, input: CommandInput): Promise<string> {
  const { channelId, userId } = input
  switch (input.commandName) {
    case 'rollcall': {
      if (input.subcommand === 'start') {
        service.startSession(channelId, userId)
        return '📋 Roll call started in this channel.'
      }
      if (input.subcommand === 'end') {
        const summary = service.endSession(channelId)
        return `✅ Roll call ended after ${summary.durationLabel} with ${summary.responseCount} responses.`
      }
      return formatStatusReply(service.status(channelId))
    }
    case 'checkin':
      return formatResponseReply(await service.recordResponse(channelId, userId, input.note ?? undefined))
    case 'checkout':
      return formatCheckoutReply(await service.recordCheckout(channelId, userId))
    case 'absent':
      return formatAbsenceReply(await service.recordAbsence(channelId, userId, input.reason ?? undefined))
    default:
      return `/${input.commandName} is not supported on this instance.`
  }
}

/**
 * Runs one slash command against the roll call service. Lifecycle conflicts
 * become a reply; anything else propagates to the caller.
 */
export async function handleCommand(service: RollCallService, input: CommandInput): Promise<string> {
  try {
    return await dispatchCommand(service, input)
  }
  catch (error) {
    if (error instanceof RollCallConflictError) return `⚠️ ${error.message}.`
    throw error
  }
}

/** Returns the reply for a chat message, or `null` when the message needs none. */
export async function handleChatMessage(service: RollCallService, input: ChatMessageInput): Promise<string | null> {
  try {
    const result = await service.handleMessage(input.channelId, input.userId, input.content)
    return result ? formatMessageOutcome(result) : null
  }
  catch (error) {
    if (error instanceof RollCallConflictError) return `⚠️ ${error.message}.`
    throw error
  }
}
