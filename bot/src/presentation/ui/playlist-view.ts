import { ActionRowBuilder, ButtonBuilder, ButtonStyle } from 'discord.js';
import type { PlaylistPage } from '../../application/services/music-service.js';
import { notice, type Notice } from '../../application/ports/notifier.js';
import { formatPosition, truncate } from '../../utils/string.js';

export const PLAYLIST_VIEW_TIMEOUT_MS = 180_000;
export const PLAYLIST_PAGE_JUMP = 5;

export const PlaylistButton = {
  FIRST: 'playlist:back',
  PREVIOUS: 'playlist:previous',
  NEXT: 'playlist:next',
  LAST: 'playlist:forward',
  STOP: 'playlist:stop',
} as const;

export type PlaylistButtonId = (typeof PlaylistButton)[keyof typeof PlaylistButton];

export function renderPlaylistPage(page: PlaylistPage): Notice {
  const lines = page.lines.map(({ position, track, current }) => {
    const title = truncate(track.title, 80);
    const line = `\`${formatPosition(position)}\` ${track.uri ? `[${title}](${track.uri})` : title}`;
    return current ? `__${line}__` : line;
  });

  return notice.message(
    `Playlist Tracks \`${formatPosition(page.first)}\` - \`${formatPosition(page.last)}\`\n\n${lines.join('\n')}`,
    { title: 'Playlist Browser', footer: `Page ${page.page + 1} / ${page.pageCount}` }
  );
}

/**
 * Page the browser shows after `button` was pressed on `page`. The result is
 * clamped again when the page is built.
 */
export function nextPlaylistPage(page: number, button: string): number {
  switch (button) {
    case PlaylistButton.FIRST:
      return page - PLAYLIST_PAGE_JUMP;
    case PlaylistButton.PREVIOUS:
      return page - 1;
    case PlaylistButton.NEXT:
      return page + 1;
    case PlaylistButton.LAST:
      return page + PLAYLIST_PAGE_JUMP;
    default:
      return page;
  }
}

export function playlistButtons(disabled = false): ActionRowBuilder<ButtonBuilder> {
  const button = (id: PlaylistButtonId, emoji: string, style: ButtonStyle) =>
    new ButtonBuilder().setCustomId(id).setEmoji(emoji).setStyle(style).setDisabled(disabled);

  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    button(PlaylistButton.FIRST, '⏮️', ButtonStyle.Primary),
    button(PlaylistButton.PREVIOUS, '⬅️', ButtonStyle.Secondary),
    button(PlaylistButton.NEXT, '➡️', ButtonStyle.Secondary),
    button(PlaylistButton.LAST, '⏭️', ButtonStyle.Primary),
    button(PlaylistButton.STOP, '⏹️', ButtonStyle.Secondary)
  );
}
