import { describe, expect, it } from 'vitest';
import { notice } from '../src/application/ports/notifier.js';
import { buildPlaylistPage } from '../src/application/services/music-service.js';
import { Banner } from '../src/domain/entities/banner.js';
import { helpNotice } from '../src/presentation/controllers/help-controller.js';
import { BannerButton, bannerButtons, clampBannerPage, renderBannerPage } from '../src/presentation/ui/banner-view.js';
import { TONE_COLORS, buildEmbed } from '../src/presentation/ui/embeds.js';
import {
  PlaylistButton,
  nextPlaylistPage,
  playlistButtons,
  renderPlaylistPage,
} from '../src/presentation/ui/playlist-view.js';
import { GUILD_ID, makeTrack } from './fakes.js';

const USER_ID = '500000000000000001';

function disabledStates(row: ReturnType<typeof bannerButtons>): (boolean | undefined)[] {
  return row.toJSON().components.map((component) => component.disabled);
}

describe('buildEmbed', () => {
  it('should color embeds by tone', () => {
    expect(buildEmbed(notice.message('hi')).toJSON()).toEqual({ color: TONE_COLORS.message, description: 'hi' });
    expect(buildEmbed(notice.failure('no')).toJSON().color).toBe(TONE_COLORS.failure);
  });

  it('should carry every optional part', () => {
    const embed = buildEmbed(
      notice.success('done', {
        title: 'Title',
        thumbnailUrl: 'https://example.com/thumb.png',
        imageUrl: 'https://example.com/image.png',
        footer: 'Page 1 / 2',
        fields: [{ name: 'Reason', value: 'Because' }],
      })
    ).toJSON();

    expect(embed).toEqual({
      color: TONE_COLORS.success,
      description: 'done',
      title: 'Title',
      thumbnail: { url: 'https://example.com/thumb.png' },
      image: { url: 'https://example.com/image.png' },
      footer: { text: 'Page 1 / 2' },
      fields: [{ name: 'Reason', value: 'Because', inline: false }],
    });
  });
});

describe('playlist view', () => {
  it('should list the page and underline the current track', () => {
    const tracks = [makeTrack('a'), makeTrack('b'), makeTrack('c', { uri: null })];
    const rendered = renderPlaylistPage(buildPlaylistPage(tracks, 1, 0, 'off'));

    expect(rendered).toEqual({
      tone: 'message',
      title: 'Playlist Browser',
      footer: 'Page 1 / 1',
      description: [
        'Playlist Tracks `001` - `010`',
        '',
        '`001` [Track a](https://example.com/watch/a)',
        '__`002` [Track b](https://example.com/watch/b)__',
        '`003` Track c',
      ].join('\n'),
    });
  });

  it('should move between pages by button', () => {
    expect(nextPlaylistPage(3, PlaylistButton.FIRST)).toBe(-2);
    expect(nextPlaylistPage(3, PlaylistButton.PREVIOUS)).toBe(2);
    expect(nextPlaylistPage(3, PlaylistButton.NEXT)).toBe(4);
    expect(nextPlaylistPage(3, PlaylistButton.LAST)).toBe(8);
    expect(nextPlaylistPage(3, PlaylistButton.STOP)).toBe(3);
  });

  it('should disable every control once stopped', () => {
    const states = playlistButtons(true).toJSON().components.map((component) => component.disabled);
    expect(states).toEqual([true, true, true, true, true]);
  });
});

describe('banner view', () => {
  const banners = [
    Banner.fromData({ id: 1, guildId: GUILD_ID, userId: USER_ID, url: 'https://example.com/1.png' }),
    Banner.fromData({ id: 2, guildId: GUILD_ID, userId: USER_ID, url: 'https://example.com/2.png' }),
  ];

  it('should show one banner per page', () => {
    expect(renderBannerPage(banners, 1)).toEqual({
      tone: 'message',
      description: `Banner added by <@${USER_ID}>`,
      title: 'Banner Browser',
      imageUrl: 'https://example.com/2.png',
      footer: 'Page 2 / 2',
    });
  });

  it('should clamp pages into the list', () => {
    expect(clampBannerPage(5, 2)).toBe(1);
    expect(clampBannerPage(-1, 2)).toBe(0);
    expect(renderBannerPage(banners, 9).footer).toBe('Page 2 / 2');
  });

  it('should explain an empty rotation', () => {
    expect(renderBannerPage([], 0)).toEqual({
      tone: 'message',
      description: 'There are no banners. Use `/banner add <url>` to add one!',
      footer: 'Page 1 / 1',
    });
  });

  it('should disable navigation at the ends', () => {
    expect(disabledStates(bannerButtons(2, 0))).toEqual([true, false, false, false, false]);
    expect(disabledStates(bannerButtons(2, 1))).toEqual([false, true, false, false, false]);
    expect(disabledStates(bannerButtons(0, 0))).toEqual([true, true, true, true, false]);
    expect(disabledStates(bannerButtons(2, 0, true))).toEqual([true, true, true, true, true]);
  });

  it('should use the banner button ids', () => {
    const ids = bannerButtons(1, 0)
      .toJSON()
      .components.map((component) => ('custom_id' in component ? component.custom_id : undefined));

    expect(ids).toEqual([
      BannerButton.PREVIOUS,
      BannerButton.NEXT,
      BannerButton.SHOW,
      BannerButton.DELETE,
      BannerButton.STOP,
    ]);
  });
});

describe('helpNotice', () => {
  it('should describe the bot', () => {
    expect(helpNotice('https://example.com/avatar.png')).toEqual({
      tone: 'message',
      description: ":sparkles: Vibingway\n\nThere isn't much to be said here just yet. Come back later.",
      thumbnailUrl: 'https://example.com/avatar.png',
    });
  });
});
