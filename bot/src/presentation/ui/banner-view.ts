import { ActionRowBuilder, ButtonBuilder, ButtonStyle } from 'discord.js';
import type { Banner } from '../../domain/entities/banner.js';
import { notice, type Notice } from '../../application/ports/notifier.js';

export const BANNER_VIEW_TIMEOUT_MS = 300_000;

export const BannerButton = {
  PREVIOUS: 'banner:previous',
  NEXT: 'banner:next',
  SHOW: 'banner:show',
  DELETE: 'banner:delete',
  STOP: 'banner:stop',
} as const;

export function clampBannerPage(page: number, count: number): number {
  return Math.max(0, Math.min(page, count - 1));
}

export function renderBannerPage(banners: readonly Banner[], page: number): Notice {
  const banner = banners[clampBannerPage(page, banners.length)];
  if (!banner) {
    return notice.message('There are no banners. Use `/banner add <url>` to add one!', { footer: 'Page 1 / 1' });
  }

  return notice.message(`Banner added by <@${banner.userId}>`, {
    title: 'Banner Browser',
    imageUrl: banner.url,
    footer: `Page ${clampBannerPage(page, banners.length) + 1} / ${Math.max(1, banners.length)}`,
  });
}

/**
 * Browser controls. Navigation is disabled at the ends; everything is
 * disabled once the browser stopped or when there are no banners.
 */
export function bannerButtons(count: number, page: number, stopped = false): ActionRowBuilder<ButtonBuilder> {
  const empty = count === 0;
  const button = (id: string, emoji: string, style: ButtonStyle, disabled: boolean) =>
    new ButtonBuilder()
      .setCustomId(id)
      .setEmoji(emoji)
      .setStyle(style)
      .setDisabled(stopped || disabled);

  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    button(BannerButton.PREVIOUS, '⬅️', ButtonStyle.Primary, empty || page === 0),
    button(BannerButton.NEXT, '➡️', ButtonStyle.Primary, empty || page >= count - 1),
    button(BannerButton.SHOW, '🖼️', ButtonStyle.Success, empty),
    button(BannerButton.DELETE, '🗑️', ButtonStyle.Danger, empty),
    button(BannerButton.STOP, '⏹️', ButtonStyle.Secondary, false)
  );
}
