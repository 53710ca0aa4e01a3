import type { Client } from 'discord.js'
import type { MessageDelivery, NotificationPayload } from '../../core/notifications/types.js'
import { sendDiscordDirectMessage, sendDiscordMessage } from './client.js'
import { logger } from '../../utils/logger.js'

function logPayload(target: string, payload: NotificationPayload): void {
  if (typeof payload === 'string') {
    logger.info(payload, { target })
    return
  }
  if (payload.content) {
    logger.debug('Discord notification content', { target, content: payload.content })
  }
  if (payload.embeds) {
    logger.debug('Discord notification embeds', { target, embeds: payload.embeds })
  }
}

/**
 * Sends channel posts and direct messages through the bot. Without a
 * connected client every message is written to the log instead.
 */
export class DiscordDelivery implements MessageDelivery {
  private client: Client | null = null

  attach(client: Client): void {
    this.client = client
  }

  async postToChannel(channelId: string, payload: NotificationPayload): Promise<void> {
    if (!this.client) {
      logPayload(`channel:${channelId}`, payload)
      return
    }
    await sendDiscordMessage(this.client, channelId, payload)
  }

  async sendDirect(personId: string, payload: NotificationPayload): Promise<void> {
    if (!this.client) {
      logPayload(`user:${personId}`, payload)
      return
    }
    await sendDiscordDirectMessage(this.client, personId, payload)
  }
}
