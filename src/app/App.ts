import type { Client } from 'discord.js'
import { loadConfig } from '../config/index.js'
import type { AppConfig } from '../config/index.js'
import { RollCallService } from '../core/rollcall/service.js'
import { SessionStore } from '../core/rollcall/store.js'
import { EffectTracker } from '../core/rollcall/effects.js'
import { RollCallScheduler } from '../core/scheduler/service.js'
import { EmployeeDirectory } from '../core/employees/repository.js'
import { JsonSummaryArchive } from '../core/archive/store.js'
import { CompositeDelivery } from '../core/notifications/composite.js'
import type { MessageDelivery } from '../core/notifications/types.js'
import { ErpClient } from '../integrations/erp/client.js'
import { DiscordDelivery } from '../integrations/discord/delivery.js'
import { WebhookDelivery } from '../integrations/discord/webhook.js'
import { DiscordIdentityResolver } from '../integrations/discord/identity.js'
import { discordRollCallMessages } from '../integrations/discord/format.js'
import { registerCommands } from '../integrations/discord/commands.js'
import { startDiscordBot } from '../integrations/discord/client.js'
import { closeLogger, configureLogger, createLogger, logger } from '../utils/logger.js'

export class App {
  private scheduler: RollCallScheduler | null = null
  private service: RollCallService | null = null
  private client: Client | null = null

  async start(): Promise<void> {
    const config = loadConfig()
    await configureLogger({
      level: config.LOG_LEVEL,
      summaryPath: config.logSummaryPath,
      detailPath: config.logDetailPath,
    })
    logger.info('App starting')
    logger.debug('App config', {
      dataPath: config.DATA_PATH,
      employeeDirectoryPath: config.employeeDirectoryPath,
      timezone: config.ROLL_CALL_TIMEZONE,
      triggers: config.triggers,
      autoCheckoutTime: config.AUTO_CHECKOUT_TIME,
      rollCallChannels: config.rollCallChannelIds.length,
      notifyChannels: config.notifyChannelIds.length,
      schedulerEnabled: config.SCHEDULER_ENABLED,
      erpDomain: config.ERP_DOMAIN,
      allowedHostnames: config.allowedHostnames,
      logLevel: config.LOG_LEVEL,
      logSummaryPath: config.logSummaryPath,
      logDetailPath: config.logDetailPath,
    })

    const directory = new EmployeeDirectory(config.employeeDirectoryPath)
    await directory.load()
    const archive = new JsonSummaryArchive(config.DATA_PATH)
    const identities = new DiscordIdentityResolver({ directory, guildId: config.DISCORD_GUILD_ID })
    const discordDelivery = new DiscordDelivery()
    const effects = new EffectTracker(createLogger('effects'))

    if (!config.ERP_DOMAIN || !config.ERP_API_KEY || !config.ERP_API_SECRET) {
      logger.warn('HR system not fully configured; attendance will be kept locally only')
    }
    const sync = new ErpClient({
      domain: config.ERP_DOMAIN,
      apiKey: config.ERP_API_KEY,
      apiSecret: config.ERP_API_SECRET,
      owner: config.ERP_OWNER,
      timezone: config.ROLL_CALL_TIMEZONE,
      allowedHostnames: config.allowedHostnames,
      timeoutMs: config.ERP_TIMEOUT_MS,
    })

    const service = new RollCallService({
      store: new SessionStore(),
      sync,
      identities,
      delivery: createDelivery(config, discordDelivery),
      messages: discordRollCallMessages,
      timezone: config.ROLL_CALL_TIMEZONE,
      archive,
      effects,
      rollCallChannelIds: config.rollCallChannelIds,
      notifyChannelIds: config.notifyChannelIds,
      autoCheckoutTime: config.AUTO_CHECKOUT_TIME,
    })
    this.service = service

    if (config.DISCORD_BOT_TOKEN) {
      if (config.DISCORD_APP_ID && config.DISCORD_GUILD_ID) {
        await registerCommands(config.DISCORD_BOT_TOKEN, config.DISCORD_APP_ID, config.DISCORD_GUILD_ID)
      }
      else {
        logger.warn('Discord app or guild ID missing; slash commands not registered')
      }
      const client = await startDiscordBot({
        token: config.DISCORD_BOT_TOKEN,
        appId: config.DISCORD_APP_ID,
        guildId: config.DISCORD_GUILD_ID,
        service,
        listenToMessages: true,
      })
      discordDelivery.attach(client)
      identities.attach(client)
      this.client = client
      logger.info('Discord bot configured')
    }
    else {
      logger.info('Discord bot not configured; messages will be logged')
    }

    if (config.SCHEDULER_ENABLED) {
      if (config.rollCallChannelIds.length === 0) {
        logger.warn('Scheduler enabled without roll call channels; scheduled roll calls will open nowhere')
      }
      this.scheduler = new RollCallScheduler({
        timezone: config.ROLL_CALL_TIMEZONE,
        triggers: config.triggers,
        effects,
        handlers: {
          'open-all': () => service.startAll('scheduled'),
          'close-all': () => service.endAll('scheduled'),
          'reminder-sweep': () => service.sendReminders(),
        },
      })
      this.scheduler.start()
    }
    else {
      logger.info('Scheduler disabled')
    }

    logger.info('App started')
  }

  async stop(): Promise<void> {
    logger.info('App stopping')
    this.scheduler?.stop()
    this.scheduler = null
    await this.service?.idle()
    if (this.client) {
      await this.client.destroy()
      this.client = null
    }
    logger.info('App stopped')
    closeLogger()
  }
}

function createDelivery(config: AppConfig, discord: DiscordDelivery): MessageDelivery {
  const deliveries: MessageDelivery[] = [discord]
  if (config.DISCORD_WEBHOOK_URL) {
    deliveries.push(new WebhookDelivery(config.DISCORD_WEBHOOK_URL))
    logger.info('Discord webhook mirror configured')
  }
  if (deliveries.length === 1) return discord
  return new CompositeDelivery(deliveries)
}
