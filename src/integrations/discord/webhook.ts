import type { MessageDelivery, NotificationPayload } from '../../core/notifications/types.js'
import { getWebhookIdentity } from './format.js'
import { logger } from '../../utils/logger.js'

export function sanitizeWebhookUrl(url: string): string {
  try {
    const parsed = new URL(url)
    const parts = parsed.pathname.split('/').filter(Boolean)
    if (parts.length >= 3 && parts[0] === 'api' && parts[1] === 'webhooks') {
      const id = parts[2]
      return `${parsed.origin}/api/webhooks/${id}/***`
    }
    return `${parsed.origin}${parsed.pathname}`
  }
  catch {
    return '[invalid-url]'
  }
}

export async function sendWebhook(
  webhookUrl: string,
  payload: NotificationPayload,
): Promise<void> {
  const identity = getWebhookIdentity()
  const body = typeof payload === 'string' ? { content: payload } : payload
  const webhookBody = {
    ...body,
    username: identity.username,
  }
  const safeUrl = sanitizeWebhookUrl(webhookUrl)
  logger.debug('Discord webhook request', {
    method: 'POST',
    url: safeUrl,
    hasContent: Boolean(body.content),
    embedCount: body.embeds?.length ?? 0,
  })

  let response: Response
  try {
    response = await fetch(webhookUrl, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
      },
      body: JSON.stringify(webhookBody),
    })
  }
  catch (error) {
    logger.error('Discord webhook request failed', { url: safeUrl, error })
    throw error
  }

  logger.debug('Discord webhook response', {
    status: response.status,
    ok: response.ok,
    url: safeUrl,
  })

  if (!response.ok) {
    logger.warn('Discord webhook returned error', {
      status: response.status,
      url: safeUrl,
    })
  }
}

/** Mirrors channel posts to one webhook. Webhooks cannot reach users directly. */
export class WebhookDelivery implements MessageDelivery {
  private readonly webhookUrl: string

  constructor(webhookUrl: string) {
    this.webhookUrl = webhookUrl
  }

  async postToChannel(_channelId: string, payload: NotificationPayload): Promise<void> {
    await sendWebhook(this.webhookUrl, payload)
  }

  async sendDirect(personId: string): Promise<void> {
    logger.debug('Webhook delivery skips direct message', { personId })
  }
}
