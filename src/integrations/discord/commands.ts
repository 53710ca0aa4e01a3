import { ApplicationCommandOptionType, REST, Routes } from 'discord.js'
import { logger } from '../../utils/logger.js'

export const ROLL_CALL_COMMANDS = [
  {
    name: 'rollcall',
    description: 'Manage the roll call in this channel',
    options: [
      {
        type: ApplicationCommandOptionType.Subcommand,
        name: 'start',
        description: 'Start a roll call in this channel',
      },
      {
        type: ApplicationCommandOptionType.Subcommand,
        name: 'end',
        description: 'End the roll call and post the summary',
      },
      {
        type: ApplicationCommandOptionType.Subcommand,
        name: 'status',
        description: 'Show the active roll call in this channel',
      },
    ],
  },
  {
    name: 'checkin',
    description: 'Mark yourself present in the active roll call',
    options: [
      {
        type: ApplicationCommandOptionType.String,
        name: 'note',
        description: 'Optional note, e.g. "working from home"',
        required: false,
        max_length: 200,
      },
    ],
  },
  {
    name: 'checkout',
    description: 'Record your check-out for today',
  },
  {
    name: 'absent',
    description: 'Report that you are away today',
    options: [
      {
        type: ApplicationCommandOptionType.String,
        name: 'reason',
        description: 'Why you are away',
        required: false,
        max_length: 200,
      },
    ],
  },
]

export async function registerCommands(token: string, appId: string, guildId: string): Promise<void> {
  const rest = new REST({ version: '10' }).setToken(token)
  logger.debug('Discord command registration request', {
    appId,
    guildId,
    count: ROLL_CALL_COMMANDS.length,
  })
  try {
    await rest.put(Routes.applicationGuildCommands(appId, guildId), { body: ROLL_CALL_COMMANDS })
  }
  catch (error) {
    logger.error('Discord command registration failed', { appId, guildId, error })
    throw error
  }
  logger.debug('Discord command registration completed', { appId, guildId })
}
