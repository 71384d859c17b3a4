import { Events, type Client, type Guild } from 'discord.js';
import { createLogger } from '@vibingway/logger';

const log = createLogger('ready');

export function handleGuildCreate(guild: Guild): void {
  log.info({ guildId: guild.id, guildName: guild.name, memberCount: guild.memberCount }, 'Bot joined new guild');
}

export function handleGuildDelete(guild: Guild): void {
  log.info({ guildId: guild.id, guildName: guild.name }, 'Bot left guild');
}

/**
 * `onReady` runs once the client logged in, with the bot's own user.
 */
export function setupReadyHandlers(client: Client, onReady: (user: { id: string; username: string }) => Promise<void>): void {
  client.once(Events.ClientReady, (readyClient) => {
    log.info({ tag: readyClient.user.tag, id: readyClient.user.id, guilds: readyClient.guilds.cache.size }, 'Bot logged in successfully');
    onReady({ id: readyClient.user.id, username: readyClient.user.username }).catch((error: unknown) =>
      log.error({ error }, 'Startup after login failed'));
  });

  client.on(Events.GuildCreate, handleGuildCreate);
  client.on(Events.GuildDelete, handleGuildDelete);
}
