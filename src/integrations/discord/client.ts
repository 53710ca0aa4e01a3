import { Client, Events, GatewayIntentBits, MessageFlags } from 'discord.js'
import type { ChatInputCommandInteraction, Message } from 'discord.js'
import { errorMessage, logger } from '../../utils/logger.js'
import type { RollCallService } from '../../core/rollcall/service.js'
import type { DiscordMessagePayload, DiscordStartOptions } from './types.js'
import { handleChatMessage, handleCommand } from './interactions.js'

const COMMAND_FAILED = '⚠️ Something went wrong while handling that command. Please try again.'

function normalizePayload(payload: DiscordMessagePayload): Exclude<DiscordMessagePayload, string> {
  if (typeof payload === 'string') {
    return { content: payload }
  }
  return payload
}

async function onCommand(service: RollCallService, interaction: ChatInputCommandInteraction): Promise<void> {
  try {
    await interaction.deferReply({ flags: MessageFlags.Ephemeral })
    if (!interaction.channelId) {
      await interaction.editReply({ content: 'This command must be used in a channel.' })
      return
    }
    const content = await handleCommand(service, {
      commandName: interaction.commandName,
      subcommand: interaction.options.getSubcommand(false),
      channelId: interaction.channelId,
      userId: interaction.user.id,
      note: interaction.options.getString('note'),
      reason: interaction.options.getString('reason'),
    })
    await interaction.editReply({ content })
  }
  catch (error) {
    logger.warn('Discord command failed', { command: interaction.commandName, error: errorMessage(error) })
    if (interaction.deferred) {
      await interaction.editReply({ content: COMMAND_FAILED }).catch((replyError: unknown) => {
        logger.debug('Discord command error reply failed', { error: errorMessage(replyError) })
      })
    }
  }
}

async function onMessage(service: RollCallService, message: Message): Promise<void> {
  if (message.author.bot) return
  try {
    const reply = await handleChatMessage(service, {
      channelId: message.channelId,
      userId: message.author.id,
      content: message.content,
    })
    if (reply) {
      await message.reply(reply)
    }
  }
  catch (error) {
    logger.warn('Discord message handling failed', { channelId: message.channelId, error: errorMessage(error) })
  }
}

export async function startDiscordBot(options: DiscordStartOptions): Promise<Client> {
  const intents = [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMembers]
  if (options.listenToMessages) {
    intents.push(GatewayIntentBits.GuildMessages, GatewayIntentBits.MessageContent)
  }
  const client = new Client({ intents })

  client.once(Events.ClientReady, (ready) => {
    logger.info(`Discord bot ready as ${ready.user.tag}`)
  })

  client.on(Events.InteractionCreate, async (interaction) => {
    if (!interaction.isChatInputCommand()) return
    await onCommand(options.service, interaction)
  })

  if (options.listenToMessages) {
    client.on(Events.MessageCreate, async (message) => {
      await onMessage(options.service, message)
    })
  }

  logger.debug('Discord bot login request', { appId: options.appId, guildId: options.guildId })
  await client.login(options.token)
  logger.debug('Discord bot login completed')
  return client
}

export async function sendDiscordMessage(client: Client, channelId: string, message: DiscordMessagePayload): Promise<void> {
  logger.debug('Discord channel send request', {
    channelId,
    messageType: typeof message === 'string' ? 'text' : 'payload',
  })
  const channel = await client.channels.fetch(channelId)
  if (!channel || !channel.isSendable()) {
    logger.warn('Discord channel fetch failed or not sendable', { channelId })
    return
  }
  await channel.send(normalizePayload(message))
  logger.debug('Discord channel send completed', { channelId })
}

export async function sendDiscordDirectMessage(client: Client, userId: string, message: DiscordMessagePayload): Promise<void> {
  logger.debug('Discord direct message request', { userId })
  const user = await client.users.fetch(userId)
  await user.send(normalizePayload(message))
  logger.debug('Discord direct message completed', { userId })
}
