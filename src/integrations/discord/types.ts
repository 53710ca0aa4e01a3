import type { NotificationPayload } from '../../core/notifications/types.js'
import type { RollCallService } from '../../core/rollcall/service.js'

export type DiscordMessagePayload = NotificationPayload

export interface DiscordStartOptions {
  token: string
  appId?: string
  guildId?: string
  service: RollCallService
  /** Listen for free-text "present" / "leaving" / "absent" replies. Needs the MessageContent intent. */
  listenToMessages: boolean
}
