import { beforeEach, describe, expect, it } from 'vitest';
import { PlayerRegistry } from '../src/application/player/player-registry.js';
import {
  MusicService,
  buildPlaylistPage,
  type MusicRequest,
} from '../src/application/services/music-service.js';
import { GuildId } from '../src/domain/value-objects/guild-id.js';
import { GuildMutex } from '../src/guildMutex.js';
import {
  FakeAudioNode,
  GUILD_ID,
  MemoryGuildSettingsRepository,
  OTHER_VOICE_CHANNEL_ID,
  RecordingNotifier,
  ScriptedPrompter,
  TEXT_CHANNEL_ID,
  VOICE_CHANNEL_ID,
  makeTrack,
  voiceChannel,
} from './fakes.js';

const USER_ID = '500000000000000001';
const TRACK_URL = 'https://example.com/watch?v=abc';
const PLAYLIST_URL = 'https://example.com/playlist?list=abc';

describe('MusicService', () => {
  let node: FakeAudioNode;
  let settings: MemoryGuildSettingsRepository;
  let registry: PlayerRegistry;
  let service: MusicService;

  const request = (overrides: Partial<MusicRequest> = {}): MusicRequest => ({
    guildId: GUILD_ID,
    userId: USER_ID,
    textChannelId: TEXT_CHANNEL_ID,
    voiceChannel: voiceChannel(),
    prompter: new ScriptedPrompter(),
    ...overrides,
  });

  /** Queue tracks through `play`, one URL load each. */
  const queue = async (...ids: string[]) => {
    const tracks = ids.map((id) => makeTrack(id));
    for (const track of tracks) {
      node.resolveResult = { type: 'track', tracks: [track] };
      await service.play(request(), { source: TRACK_URL });
    }
    return tracks;
  };

  beforeEach(() => {
    node = new FakeAudioNode();
    settings = new MemoryGuildSettingsRepository();
    registry = new PlayerRegistry({ node, notifier: new RecordingNotifier(), settings, mutex: new GuildMutex() });
    service = new MusicService(node, registry);
  });

  it('should refuse commands until the node is ready', async () => {
    node.ready = false;
    await expect(service.join(request())).rejects.toThrow("Just a moment, I'm still getting things ready...");
    expect(() => service.nowPlaying(GUILD_ID)).toThrow("Just a moment, I'm still getting things ready...");
  });

  describe('join and leave', () => {
    it('should require the user to be in a voice channel', async () => {
      await expect(service.join(request({ voiceChannel: null }))).rejects.toThrow(
        'You are not connected to a voice channel.'
      );
    });

    it('should connect, stay, and move between channels', async () => {
      await expect(service.join(request())).resolves.toEqual({
        notice: { tone: 'success', description: `Connected to <#${VOICE_CHANNEL_ID}>.` },
      });
      expect((await service.join(request())).notice.description).toBe(
        `I'm already connected to <#${VOICE_CHANNEL_ID}>.`
      );

      const moved = await service.join(request({ voiceChannel: voiceChannel(OTHER_VOICE_CHANNEL_ID) }));

      expect(moved.notice.description).toBe(`Moved to <#${OTHER_VOICE_CHANNEL_ID}>.`);
      expect(node.session().moveTo).toHaveBeenCalledWith(OTHER_VOICE_CHANNEL_ID);
      expect(registry.get(GUILD_ID)?.voiceChannelId).toBe(OTHER_VOICE_CHANNEL_ID);
    });

    it('should leave the voice channel', async () => {
      await expect(service.leave(request())).rejects.toThrow('I am not connected to any voice channels.');

      await service.join(request());
      const result = await service.leave(request());

      expect(result.notice.description).toBe(`Disconnected from <#${VOICE_CHANNEL_ID}>.`);
      expect(registry.get(GUILD_ID)).toBeUndefined();
    });
  });

  describe('play', () => {
    it('should add a track and start playing it', async () => {
      const track = makeTrack('a');
      node.resolveResult = { type: 'track', tracks: [track] };

      const result = await service.play(request(), { source: TRACK_URL });

      expect(result.notice.description).toBe(
        `<@${USER_ID}> added [\`Track a\`](https://example.com/watch/a) to the playlist at position #1.`
      );
      expect(result.track).toBe(track);
      expect(node.session().played).toEqual([track]);
      expect(registry.get(GUILD_ID)?.state).toBe('playing');
    });

    it('should append without interrupting the current track', async () => {
      const [a] = await queue('a');
      const b = makeTrack('b');
      node.resolveResult = { type: 'track', tracks: [b] };

      const result = await service.play(request(), { source: TRACK_URL });

      expect(result.notice.description).toBe(
        `<@${USER_ID}> added [\`Track b\`](https://example.com/watch/b) to the playlist at position #2.`
      );
      expect(node.session().played).toEqual([a]);
    });

    it('should keep added tracks and warn when playback cannot start', async () => {
      await service.join(request());
      node.session().play.mockRejectedValueOnce(new Error('node unavailable'));
      const track = makeTrack('a');
      node.resolveResult = { type: 'track', tracks: [track] };

      const result = await service.play(request(), { source: TRACK_URL });

      expect(result.notice).toEqual({
        tone: 'warning',
        description:
          `<@${USER_ID}> added [\`Track a\`](https://example.com/watch/a) to the playlist at position #1. ` +
          'Playback could not be started, try `/music play` again.',
      });
      expect(result.track).toBe(track);
      expect(registry.get(GUILD_ID)?.playlist.items).toEqual([track]);
      expect(registry.get(GUILD_ID)?.state).toBe('idle');
    });

    it('should add whole playlists', async () => {
      node.resolveResult = { type: 'playlist', name: 'Mix', tracks: [makeTrack('a'), makeTrack('b'), makeTrack('c')] };

      const result = await service.play(request({ prompter: new ScriptedPrompter([0]) }), { source: PLAYLIST_URL });

      expect(result.notice.description).toBe(`<@${USER_ID}> added 3 tracks to the playlist #1.`);
      expect(registry.get(GUILD_ID)?.playlist.length).toBe(3);
    });

    it('should continue with new tracks after the playlist ended', async () => {
      const [a] = await queue('a');
      await registry.dispatch(GUILD_ID, { type: 'trackEnd', track: a, reason: 'finished' });
      expect(registry.get(GUILD_ID)?.state).toBe('idle');

      const [b] = await queue('b');

      expect(node.session().played).toEqual([a, b]);
      expect(registry.get(GUILD_ID)?.playlist.position).toBe(1);
    });

    it('should leave everything untouched when resolving fails', async () => {
      node.resolveResult = { type: 'empty' };

      await expect(service.play(request(), { source: TRACK_URL })).rejects.toThrow(
        'I could not find any usable music under that URL.'
      );
      expect(registry.get(GUILD_ID)).toBeUndefined();
      expect(node.connect).not.toHaveBeenCalled();
    });

    it('should reject a source together with a position', async () => {
      await expect(service.play(request(), { source: 'query', position: 1 })).rejects.toThrow(
        'The `source` and `position` options are mutually exclusive.'
      );
    });

    it('should play from a position', async () => {
      const [a, , c] = await queue('a', 'b', 'c');

      const result = await service.play(request(), { position: 3 });

      expect(result.notice.description).toBe('Playing playlist from position 3.');
      expect(node.session().played).toEqual([a, c]);
      expect(registry.get(GUILD_ID)?.playlist.position).toBe(2);
    });

    it('should resume from the cursor without options', async () => {
      const [a] = await queue('a');
      await service.stop(request());

      const result = await service.play(request());

      expect(result.notice.description).toBe('Starting playback from position 1.');
      expect(node.session().played).toEqual([a, a]);
    });

    it('should report an empty playlist', async () => {
      await expect(service.play(request())).rejects.toThrow('The playlist is empty.');
      await expect(service.play(request(), { position: 1 })).rejects.toThrow('The playlist is empty.');
    });

    it('should require the user to share the player channel', async () => {
      await service.join(request());

      await expect(
        service.play(request({ voiceChannel: voiceChannel(OTHER_VOICE_CHANNEL_ID) }), { position: 1 })
      ).rejects.toThrow(`You are not connected to <#${VOICE_CHANNEL_ID}>.`);
    });
  });

  describe('transport controls', () => {
    it('should need a loaded track', async () => {
      await service.join(request());

      await expect(service.pause(request())).rejects.toThrow('I am not playing anything.');
      await expect(service.skip(request())).rejects.toThrow('I am not playing anything.');
    });

    it('should pause and resume', async () => {
      await queue('a');

      expect((await service.pause(request())).notice.description).toBe('Paused playback of `Track a`.');
      await expect(service.pause(request())).rejects.toThrow('Playback is already paused.');
      expect((await service.resume(request())).notice.description).toBe('Resumed playback of `Track a`.');
      await expect(service.resume(request())).rejects.toThrow('Playback is not paused.');
    });

    it('should stop playback', async () => {
      await queue('a');

      const result = await service.stop(request());

      expect(result.notice.description).toBe('Stopped playback of `Track a`.');
      expect(registry.get(GUILD_ID)?.state).toBe('idle');
    });

    it('should skip to the next track and stop after the last one', async () => {
      const [, b] = await queue('a', 'b');

      expect((await service.skip(request())).notice.description).toBe('Skipped playback of `Track a`.');
      expect(registry.get(GUILD_ID)?.nowPlaying).toBe(b);

      expect((await service.skip(request())).notice.description).toBe('Skipped playback of `Track b`.');
      expect(registry.get(GUILD_ID)?.state).toBe('idle');
    });

    it('should skip onto the track that replaced a removed first track', async () => {
      const [a, b] = await queue('a', 'b');
      await service.remove(request(), 1);

      expect((await service.skip(request())).notice.description).toBe('Skipped playback of `Track a`.');
      expect(node.session().played).toEqual([a, b]);
    });

    it('should seek within the track', async () => {
      await queue('a');

      const result = await service.seek(request(), 30);

      expect(result.notice.description).toBe('Moved playback of `Track a` to `00:30`.');
      expect(node.session().seek).toHaveBeenCalledWith(30_000);
    });
  });

  describe('playlist management', () => {
    it('should need a player', () => {
      expect(() => service.playlistPage(GUILD_ID, 0)).toThrow(
        "I can't show you the playlist without first joining a voice channel."
      );
    });

    it('should remove tracks by 1-based position', async () => {
      await queue('a', 'b');

      await expect(service.remove(request(), 3)).rejects.toThrow(
        'You must specify a position within the playlist range (max: 2).'
      );
      const result = await service.remove(request(), 2);

      expect(result.notice.description).toBe('Removed [Track b](https://example.com/watch/b) from the playlist.');
      expect(registry.get(GUILD_ID)?.playlist.length).toBe(1);
    });

    it('should clear the playlist after confirmation', async () => {
      await queue('a', 'b');
      const prompter = new ScriptedPrompter([], [true]);

      const result = await service.clear(request({ prompter }));

      expect(prompter.messages).toEqual(['Are you sure you want to remove 2 track(s) from the playlist?']);
      expect(result.notice.description).toBe('Removed 2 track(s) from the playlist.');
      expect(registry.get(GUILD_ID)?.playlist.isEmpty()).toBe(true);
    });

    it('should keep the playlist when clearing is declined', async () => {
      await queue('a');

      const declined = await service.clear(request({ prompter: new ScriptedPrompter([], [false]) }));
      const cancelled = await service.clear(request({ prompter: new ScriptedPrompter([], ['cancel']) }));

      expect(declined.notice.description).toBe('The playlist was not cleared.');
      expect(cancelled.notice.description).toBe('The playlist was not cleared.');
      await expect(service.clear(request({ prompter: new ScriptedPrompter([], ['timeout']) }))).rejects.toThrow(
        'The interaction timed out.'
      );
      expect(registry.get(GUILD_ID)?.playlist.length).toBe(1);
    });

    it('should shuffle the playlist', async () => {
      await queue('a', 'b', 'c');
      expect((await service.shuffle(request())).notice.description).toBe('Shuffled 3 track(s).');
    });
  });

  describe('now playing', () => {
    it('should describe the loaded track and its progress', async () => {
      await queue('a');
      node.session().positionMs = 65_000;

      const result = service.nowPlaying(GUILD_ID);

      expect(result.notice).toEqual({
        tone: 'message',
        description: '#001 [Track a](https://example.com/watch/a) (01:05 / 03:00)',
      });
    });

    it('should show streams as live with their artwork', async () => {
      const live = makeTrack('live', { isStream: true, uri: null, artworkUrl: 'https://example.com/art.png' });
      node.resolveResult = { type: 'track', tracks: [live] };
      await service.play(request(), { source: TRACK_URL });

      expect(service.nowPlaying(GUILD_ID).notice).toEqual({
        tone: 'message',
        description: '#001 Track live (00:00 / live)',
        thumbnailUrl: 'https://example.com/art.png',
      });
    });

    it('should fail when nothing is loaded', async () => {
      await service.join(request());
      expect(() => service.nowPlaying(GUILD_ID)).toThrow('I am not playing anything at the moment.');
    });
  });

  describe('settings', () => {
    it('should show and persist the repeat mode', async () => {
      await service.join(request());

      expect((await service.repeat(request())).notice.description).toBe('Repeat mode is currently set to `off`');
      expect((await service.repeat(request(), 'all')).notice.description).toBe('Playlist repeating enabled.');
      expect(registry.get(GUILD_ID)?.playlist.repeat).toBe('all');
      expect((await settings.findByGuildId(GuildId.from(GUILD_ID)))?.repeatMode).toBe('all');
    });

    it('should show and persist the clamped volume', async () => {
      await service.join(request());

      expect((await service.volume(request())).notice.description).toBe('The volume is set to `100%`.');
      expect((await service.volume(request(), 200)).notice.description).toBe('Volume set to `150%`.');
      expect((await settings.findByGuildId(GuildId.from(GUILD_ID)))?.volume).toBe(150);
    });
  });
});

describe('buildPlaylistPage', () => {
  const tracks = Array.from({ length: 23 }, (_, index) => makeTrack(String(index + 1)));

  it('should slice ten tracks per page and mark the cursor', () => {
    const page = buildPlaylistPage(tracks, 12, 1, 'off');

    expect(page.page).toBe(1);
    expect(page.pageCount).toBe(3);
    expect(page.first).toBe(11);
    expect(page.lines.map((line) => line.position)).toEqual([11, 12, 13, 14, 15, 16, 17, 18, 19, 20]);
    expect(page.lines.filter((line) => line.current).map((line) => line.position)).toEqual([13]);
  });

  it('should clamp the page', () => {
    expect(buildPlaylistPage(tracks, 0, 99, 'off').lines).toHaveLength(3);
    expect(buildPlaylistPage(tracks, 0, -4, 'off').page).toBe(0);
    expect(buildPlaylistPage([], -1, 3, 'all').pageCount).toBe(1);
  });
});
