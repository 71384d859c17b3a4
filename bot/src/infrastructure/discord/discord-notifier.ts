import type { Client } from 'discord.js';
import { createLogger } from '@vibingway/logger';
import type { Notice, Notifier } from '../../application/ports/notifier.js';
import { buildEmbed } from '../../presentation/ui/embeds.js';

const log = createLogger('notifier');

/**
 * Posts notices to guild text channels, cache first.
 */
export class DiscordNotifier implements Notifier {
  constructor(private readonly client: Client) {}

  async send(channelId: string, notice: Notice): Promise<void> {
    const channel = this.client.channels.cache.get(channelId) ?? (await this.client.channels.fetch(channelId));

    if (!channel?.isSendable()) {
      log.warn({ channelId }, 'Notification channel is not available');
      return;
    }

    await channel.send({ embeds: [buildEmbed(notice)] });
  }
}
