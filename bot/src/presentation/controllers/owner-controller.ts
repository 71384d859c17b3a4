import type { ChatInputCommandInteraction } from 'discord.js';
import { notice } from '../../application/ports/notifier.js';
import type { ExitCode, OwnerService, SyncScope } from '../../application/services/owner-service.js';
import { Failure } from '../../errors.js';
import { DiscordPrompter } from '../../infrastructure/discord/discord-prompter.js';
import { buildEmbed } from '../ui/embeds.js';
import { respond } from '../ui/respond.js';

const SYNC_MESSAGES: Record<SyncScope, string> = {
  all: ':gear: Syncing commands. This might take a while.',
  global: ':gear: Syncing global commands. This might take a while.',
  admin: ':gear: Syncing admin commands. This might take a while.',
};

function isSyncScope(value: string): value is SyncScope {
  return value === 'all' || value === 'global' || value === 'admin';
}

/**
 * Owner Controller
 * `/owner` is registered in the admin guilds only and usable by admin users
 */
export class OwnerController {
  constructor(
    private readonly owner: OwnerService,
    private readonly adminGuildIds: readonly string[],
    private readonly promptTimeoutMs: number,
    private readonly exit: (code: ExitCode) => Promise<void>
  ) {}

  async handleCommand(interaction: ChatInputCommandInteraction): Promise<void> {
    if (!interaction.guildId || !this.adminGuildIds.includes(interaction.guildId)) {
      throw new Failure('This command is not available in this server.');
    }
    this.owner.checkAdmin(interaction.user.id);

    const group = interaction.options.getSubcommandGroup();
    const subcommand = interaction.options.getSubcommand();

    if (group === 'sync') {
      if (!isSyncScope(subcommand)) {
        throw new Failure(`Unknown sync scope \`${subcommand}\`.`);
      }
      await respond(interaction, { embeds: [buildEmbed(notice.message(SYNC_MESSAGES[subcommand]))] });
      await respond(interaction, { embeds: [buildEmbed(await this.owner.sync(subcommand))] });
      return;
    }

    switch (subcommand) {
      case 'restart':
      case 'shutdown': {
        const prompter = new DiscordPrompter(interaction, this.promptTimeoutMs);
        const result = subcommand === 'restart'
          ? await this.owner.restart(prompter)
          : await this.owner.shutdown(prompter);

        if (result.notice) {
          await respond(interaction, { embeds: [buildEmbed(result.notice)] });
        }
        if (result.exitCode !== undefined) {
          await this.exit(result.exitCode);
        }
        break;
      }
      case 'sql':
        await respond(interaction, { embeds: [buildEmbed(this.owner.sql(interaction.options.getString('sql', true)))] });
        break;
      default:
        throw new Failure(`Unknown owner command \`${subcommand}\`.`);
    }
  }
}
