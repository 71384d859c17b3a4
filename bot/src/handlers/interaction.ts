import { Events, type ChatInputCommandInteraction, type Client } from 'discord.js';
import { createLogger } from '@vibingway/logger';
import { commandCounter } from '../metrics.js';
import type { CommandErrorHandler } from '../presentation/error-handler.js';
import type { BannerController } from '../presentation/controllers/banner-controller.js';
import type { HelpController } from '../presentation/controllers/help-controller.js';
import type { MusicController } from '../presentation/controllers/music-controller.js';
import type { OwnerController } from '../presentation/controllers/owner-controller.js';
import { Failure } from '../errors.js';

const log = createLogger('interactions');

export interface InteractionHandlerContext {
  music: MusicController;
  banner: BannerController;
  owner: OwnerController;
  help: HelpController;
  errors: CommandErrorHandler;
}

/** `music play`, `owner sync all` */
export function qualifiedCommandName(interaction: ChatInputCommandInteraction): string {
  return [
    interaction.commandName,
    interaction.options.getSubcommandGroup(false),
    interaction.options.getSubcommand(false),
  ].filter((part): part is string => Boolean(part)).join(' ');
}

export async function handleChatInputCommand(
  interaction: ChatInputCommandInteraction,
  context: InteractionHandlerContext
): Promise<void> {
  const command = qualifiedCommandName(interaction);
  log.info({ user: interaction.user.tag, guildId: interaction.guildId, command }, `${interaction.user.tag} used /${command}.`);

  try {
    switch (interaction.commandName) {
      case 'music':
        await context.music.handleCommand(interaction);
        break;
      case 'banner':
        await context.banner.handleCommand(interaction);
        break;
      case 'owner':
        await context.owner.handleCommand(interaction);
        break;
      case 'help':
        await context.help.handleCommand(interaction);
        break;
      default:
        throw new Failure('I do not know that command.');
    }
    commandCounter.labels(interaction.commandName, 'success').inc();
  } catch (error) {
    const outcome = await context.errors.handle(
      interaction,
      { command, userTag: interaction.user.tag, channelId: interaction.channelId },
      error
    );
    commandCounter.labels(interaction.commandName, outcome).inc();
  }
}

export function setupInteractionHandlers(client: Client, context: InteractionHandlerContext): void {
  client.on(Events.InteractionCreate, (interaction) => {
    if (!interaction.isChatInputCommand()) {
      return;
    }
    handleChatInputCommand(interaction, context).catch((error: unknown) =>
      log.error({ error }, 'Interaction handling failed'));
  });

  log.info('Interaction handlers registered');
}
