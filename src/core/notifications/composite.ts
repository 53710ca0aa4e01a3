import { errorMessage, logger } from '../../utils/logger.js'
import type { MessageDelivery, NotificationPayload } from './types.js'

/**
 * Fans every message out to several deliveries. One failing delivery is
 * logged and does not stop the others.
 */
export class CompositeDelivery implements MessageDelivery {
  private readonly deliveries: MessageDelivery[]

  constructor(deliveries: MessageDelivery[]) {
    this.deliveries = deliveries
  }

  async postToChannel(channelId: string, payload: NotificationPayload): Promise<void> {
    await this.fanOut('channel', channelId, delivery => delivery.postToChannel(channelId, payload))
  }

  async sendDirect(personId: string, payload: NotificationPayload): Promise<void> {
    await this.fanOut('direct', personId, delivery => delivery.sendDirect(personId, payload))
  }

  private async fanOut(
    target: 'channel' | 'direct',
    id: string,
    send: (delivery: MessageDelivery) => Promise<void>,
  ): Promise<void> {
    if (this.deliveries.length === 0) return

    const results = await Promise.allSettled(this.deliveries.map(send))

    results.forEach((result, index) => {
      if (result.status === 'fulfilled') return
      logger.warn('Message delivery failed', {
        deliveryIndex: index + 1,
        target,
        id,
        error: errorMessage(result.reason),
      })
    })
  }
}
