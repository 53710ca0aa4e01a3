import type { Client } from 'discord.js'
import type { EmployeeIdentity, IdentityResolver } from '../../core/rollcall/types.js'
import { IdentityNotFoundError } from '../../core/rollcall/errors.js'
import type { EmployeeDirectory } from '../../core/employees/repository.js'
import { errorMessage, logger } from '../../utils/logger.js'

export interface DiscordIdentityResolverOptions {
  directory: EmployeeDirectory
  client?: Client
  guildId?: string
}

/**
 * Maps a Discord user to an HR employee. The employee id comes from the
 * directory; the display name from the guild member when one is reachable,
 * then the directory, then the raw user id.
 */
export class DiscordIdentityResolver implements IdentityResolver {
  private readonly directory: EmployeeDirectory
  private client?: Client
  private readonly guildId?: string

  constructor(options: DiscordIdentityResolverOptions) {
    this.directory = options.directory
    this.client = options.client
    this.guildId = options.guildId
  }

  attach(client: Client): void {
    this.client = client
  }

  async resolve(personId: string): Promise<EmployeeIdentity> {
    const record = this.directory.find(personId)
    if (!record) {
      throw new IdentityNotFoundError(personId, 'not listed in the employee directory')
    }
    const displayName = (await this.lookupName(personId)) ?? record.name ?? personId
    return { personId, displayName, employeeId: record.employeeId }
  }

  private async lookupName(personId: string): Promise<string | undefined> {
    const client = this.client
    if (!client) return undefined
    try {
      if (this.guildId) {
        const guild = await client.guilds.fetch(this.guildId)
        const member = await guild.members.fetch(personId)
        return member.displayName
      }
      const user = await client.users.fetch(personId)
      return user.displayName
    }
    catch (error) {
      logger.debug('Discord display name lookup failed', { personId, error: errorMessage(error) })
      return undefined
    }
  }
}
