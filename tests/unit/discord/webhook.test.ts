import { describe, it, expect, vi, beforeEach } from 'vitest'
import { WebhookDelivery, sanitizeWebhookUrl } from '../../../src/integrations/discord/webhook.js'

const fetchMock = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>()

describe('sanitizeWebhookUrl', () => {
  it('hides the webhook token', () => {
    expect(sanitizeWebhookUrl('https://discord.com/api/webhooks/123/test-token')).toBe('https://discord.com/api/webhooks/123/***')
    expect(sanitizeWebhookUrl('https://hooks.example.com/path?x=1')).toBe('https://hooks.example.com/path')
    expect(sanitizeWebhookUrl('nope')).toBe('[invalid-url]')
  })
})

describe('WebhookDelivery', () => {
  beforeEach(() => {
    fetchMock.mockReset()
    vi.stubGlobal('fetch', fetchMock)
  })

  it('posts channel messages as JSON with the bot username', async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 204 }))
    const delivery = new WebhookDelivery('https://discord.com/api/webhooks/123/test-token')

    await delivery.postToChannel('C1', 'hello')

    const call = fetchMock.mock.calls[0]
    expect(call?.[0]).toBe('https://discord.com/api/webhooks/123/test-token')
    expect(call?.[1]?.method).toBe('POST')
    expect(JSON.parse(String(call?.[1]?.body))).toEqual({ content: 'hello', username: 'Roll Call' })
  })

  it('does not send direct messages', async () => {
    const delivery = new WebhookDelivery('https://discord.com/api/webhooks/123/test-token')

    await delivery.sendDirect('U1')

    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('propagates network failures', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'))
    const delivery = new WebhookDelivery('https://discord.com/api/webhooks/123/test-token')

    await expect(delivery.postToChannel('C1', 'hello')).rejects.toThrow('fetch failed')
  })
})
