import { Colors, EmbedBuilder } from 'discord.js';
import type { Notice, NoticeTone } from '../../application/ports/notifier.js';

export const TONE_COLORS: Record<NoticeTone, number> = {
  message: 0xe26682,
  success: Colors.Green,
  warning: Colors.Yellow,
  failure: Colors.Red,
};

/**
 * Render a Notice as a Discord embed.
 */
export function buildEmbed(notice: Notice): EmbedBuilder {
  const embed = new EmbedBuilder().setColor(TONE_COLORS[notice.tone]).setDescription(notice.description);

  if (notice.title) embed.setTitle(notice.title);
  if (notice.thumbnailUrl) embed.setThumbnail(notice.thumbnailUrl);
  if (notice.imageUrl) embed.setImage(notice.imageUrl);
  if (notice.footer) embed.setFooter({ text: notice.footer });
  if (notice.fields && notice.fields.length > 0) {
    embed.addFields(notice.fields.map((field) => ({ name: field.name, value: field.value, inline: field.inline ?? false })));
  }

  return embed;
}
