import { ComponentType, MessageFlags, type ButtonInteraction, type ChatInputCommandInteraction } from 'discord.js';
import { createLogger } from '@vibingway/logger';
import { notice } from '../../application/ports/notifier.js';
import type { BannerService } from '../../application/services/banner-service.js';
import type { Banner } from '../../domain/entities/banner.js';
import { Failure, errorMessage } from '../../errors.js';
import { buildEmbed } from '../ui/embeds.js';
import {
  BANNER_VIEW_TIMEOUT_MS,
  BannerButton,
  bannerButtons,
  clampBannerPage,
  renderBannerPage,
} from '../ui/banner-view.js';
import { respond } from '../ui/respond.js';

const log = createLogger('banner-controller');

export class BannerController {
  constructor(private readonly banners: BannerService) {}

  async handleCommand(interaction: ChatInputCommandInteraction): Promise<void> {
    const { guildId } = interaction;
    if (!guildId) {
      throw new Failure('This command can only be used in a server.');
    }

    switch (interaction.options.getSubcommand()) {
      case 'add': {
        await interaction.deferReply();
        const result = await this.banners.add(guildId, interaction.user.id, interaction.options.getString('url', true));
        await respond(interaction, { embeds: [buildEmbed(result)] });
        break;
      }
      case 'list':
        await this.showBrowser(interaction, guildId);
        break;
      case 'toggle': {
        const enabled = interaction.options.getString('enabled');
        const result = await this.banners.toggle(guildId, enabled === null ? undefined : enabled === 'on');
        await respond(interaction, { embeds: [buildEmbed(result)] });
        break;
      }
      case 'interval': {
        const result = await this.banners.interval(guildId, interaction.options.getInteger('interval') ?? undefined);
        await respond(interaction, { embeds: [buildEmbed(result)] });
        break;
      }
      default:
        throw new Failure('Unknown banner command.');
    }
  }

  /**
   * One banner per page with controls to apply or delete it. Only the
   * invoking user can use the controls.
   */
  private async showBrowser(interaction: ChatInputCommandInteraction, guildId: string): Promise<void> {
    let banners: Banner[] = await this.banners.list(guildId);
    let page = 0;
    let updating = false;

    const message = await interaction.reply({
      embeds: [buildEmbed(renderBannerPage(banners, page))],
      components: [bannerButtons(banners.length, page)],
      fetchReply: true,
    });

    const collector = message.createMessageComponentCollector({
      componentType: ComponentType.Button,
      filter: (button) => button.user.id === interaction.user.id,
      time: BANNER_VIEW_TIMEOUT_MS,
    });

    const refresh = async (button: ButtonInteraction): Promise<void> => {
      banners = await this.banners.list(guildId);
      page = clampBannerPage(page, banners.length);
      await button.update({
        embeds: [buildEmbed(renderBannerPage(banners, page))],
        components: [bannerButtons(banners.length, page)],
      });
    };

    const applyBanner = async (button: ButtonInteraction, url: string): Promise<void> => {
      try {
        await this.banners.setBanner(guildId, url);
        await button.followUp({ embeds: [buildEmbed(notice.success('I have updated the banner.', { thumbnailUrl: url }))] });
      } catch (error) {
        log.warn({ guildId, url, error: errorMessage(error) }, 'Manual banner change failed');
        await button.followUp({
          embeds: [buildEmbed(notice.failure('I could not update the banner!', {
            fields: [{ name: 'Reason', value: errorMessage(error) }],
          }))],
          flags: MessageFlags.Ephemeral,
        });
      } finally {
        updating = false;
      }
    };

    const onButton = async (button: ButtonInteraction): Promise<void> => {
      const current = banners[page];

      switch (button.customId) {
        case BannerButton.PREVIOUS:
          page -= 1;
          await refresh(button);
          break;
        case BannerButton.NEXT:
          page += 1;
          await refresh(button);
          break;
        case BannerButton.SHOW:
          if (!current) return;
          if (updating) {
            await button.reply({
              embeds: [buildEmbed(notice.failure('I am still working on your last change request.'))],
              flags: MessageFlags.Ephemeral,
            });
            return;
          }
          updating = true;
          await button.reply({
            embeds: [buildEmbed(notice.success('I am updating the banner. This may take a moment.', { thumbnailUrl: current.url }))],
            flags: MessageFlags.Ephemeral,
          });
          await applyBanner(button, current.url);
          break;
        case BannerButton.DELETE: {
          if (!current) return;
          const result = await this.banners.remove(guildId, current.url);
          await refresh(button);
          await button.followUp({ embeds: [buildEmbed(result.notice)] });
          break;
        }
        case BannerButton.STOP:
          collector.stop('stopped');
          await button.update({ components: [bannerButtons(banners.length, page, true)] });
          break;
      }
    };

    collector.on('collect', (button) => {
      onButton(button).catch((error: unknown) =>
        log.error({ guildId, error: errorMessage(error) }, 'Banner browser update failed'));
    });

    collector.on('end', (_collected, reason) => {
      if (reason !== 'time') {
        return;
      }
      interaction.editReply({ components: [bannerButtons(banners.length, page, true)] }).catch((error: unknown) =>
        log.debug({ guildId, error: errorMessage(error) }, 'Unable to disable banner browser'));
    });
  }
}
