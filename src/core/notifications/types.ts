import type { APIEmbed } from 'discord.js'

export type NotificationPayload = string | {
  content?: string
  embeds?: APIEmbed[]
}

/** Outbound chat messages. Callers log failures; nothing here retries. */
export interface MessageDelivery {
  postToChannel(channelId: string, payload: NotificationPayload): Promise<void>
  sendDirect(personId: string, payload: NotificationPayload): Promise<void>
}
