import { REST, Routes } from 'discord.js';
import { createLogger } from '@vibingway/logger';
import type { CommandRegistrar } from '../../application/ports/command-registrar.js';
import { withRetry } from '../../errors.js';
import { adminCommands, globalCommands } from '../../presentation/commands.js';

const log = createLogger('commands');

export class DiscordCommandRegistrar implements CommandRegistrar {
  private readonly rest: REST;

  constructor(token: string, private readonly applicationId: string) {
    this.rest = new REST({ version: '10' }).setToken(token);
  }

  async registerGlobal(): Promise<number> {
    const body = globalCommands();
    await withRetry(() => this.rest.put(Routes.applicationCommands(this.applicationId), { body }));
    log.info({ count: body.length }, 'Registered global commands');
    return body.length;
  }

  async registerAdmin(guildIds: readonly string[]): Promise<number> {
    const body = adminCommands();
    for (const guildId of guildIds) {
      await withRetry(() => this.rest.put(Routes.applicationGuildCommands(this.applicationId, guildId), { body }));
      log.info({ guildId, count: body.length }, 'Registered admin commands');
    }
    return body.length * guildIds.length;
  }
}
