import '../env-loader.js';

import { env } from '@vibingway/config';
import { logger } from '@vibingway/logger';
import { DiscordCommandRegistrar } from '../infrastructure/discord/discord-command-registrar.js';

// Registers global commands everywhere and owner commands in the admin guilds.
const registrar = new DiscordCommandRegistrar(env.DISCORD_TOKEN, env.DISCORD_APPLICATION_ID);

try {
  const global = await registrar.registerGlobal();
  const admin = await registrar.registerAdmin(env.ADMIN_GUILD_IDS);
  logger.info({ global, admin }, 'Slash commands registered');
} catch (error) {
  logger.error({ error }, 'Failed to register slash commands');
  process.exitCode = 1;
}
