import {
  DiscordAPIError,
  GuildFeature,
  PermissionFlagsBits,
  RESTJSONErrorCodes,
  type Client,
  type Guild,
} from 'discord.js';
import type { GuildBannerTarget, GuildDirectory } from '../../application/ports/guild-directory.js';
import { Failure } from '../../errors.js';

export function toBannerTarget(guild: Guild): GuildBannerTarget {
  return {
    id: guild.id,
    name: guild.name,
    supportsBanner: guild.features.includes(GuildFeature.Banner),
    canManageGuild: guild.members.me?.permissions.has(PermissionFlagsBits.ManageGuild) ?? false,
  };
}

export class DiscordGuildDirectory implements GuildDirectory {
  constructor(private readonly client: Client) {}

  list(): GuildBannerTarget[] {
    return this.client.guilds.cache.map(toBannerTarget);
  }

  get(guildId: string): GuildBannerTarget | undefined {
    const guild = this.client.guilds.cache.get(guildId);
    return guild ? toBannerTarget(guild) : undefined;
  }

  async setBanner(guildId: string, image: Buffer, reason?: string): Promise<boolean> {
    const guild = this.client.guilds.cache.get(guildId);
    if (!guild) {
      throw new Failure('I am no longer a member of that server.');
    }

    try {
      await guild.setBanner(image, reason);
      return true;
    } catch (error) {
      if (error instanceof DiscordAPIError && error.code === RESTJSONErrorCodes.MissingPermissions) {
        return false;
      }
      throw error;
    }
  }
}
