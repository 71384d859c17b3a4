import type { ChatInputCommandInteraction } from 'discord.js';
import { notice, type Notice } from '../../application/ports/notifier.js';
import { buildEmbed } from '../ui/embeds.js';

export function helpNotice(avatarUrl?: string): Notice {
  return notice.message(
    ":sparkles: Vibingway\n\nThere isn't much to be said here just yet. Come back later.",
    avatarUrl ? { thumbnailUrl: avatarUrl } : {}
  );
}

export class HelpController {
  async handleCommand(interaction: ChatInputCommandInteraction): Promise<void> {
    await interaction.reply({ embeds: [buildEmbed(helpNotice(interaction.client.user.displayAvatarURL()))] });
  }
}
