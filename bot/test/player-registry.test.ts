import { beforeEach, describe, expect, it } from 'vitest';
import { PlayerRegistry } from '../src/application/player/player-registry.js';
import { GuildSettings } from '../src/domain/entities/guild-settings.js';
import { GuildId } from '../src/domain/value-objects/guild-id.js';
import { GuildMutex } from '../src/guildMutex.js';
import {
  FakeAudioNode,
  GUILD_ID,
  MemoryGuildSettingsRepository,
  OTHER_GUILD_ID,
  OTHER_VOICE_CHANNEL_ID,
  RecordingNotifier,
  TEXT_CHANNEL_ID,
  VOICE_CHANNEL_ID,
  makeTrack,
  voiceChannel,
} from './fakes.js';

describe('PlayerRegistry', () => {
  let node: FakeAudioNode;
  let notifier: RecordingNotifier;
  let settings: MemoryGuildSettingsRepository;
  let registry: PlayerRegistry;

  const createPlayer = (guildId: string = GUILD_ID) =>
    registry.run(guildId, () => registry.create(guildId, voiceChannel(), TEXT_CHANNEL_ID));

  beforeEach(() => {
    node = new FakeAudioNode();
    notifier = new RecordingNotifier();
    settings = new MemoryGuildSettingsRepository();
    registry = new PlayerRegistry({ node, notifier, settings, mutex: new GuildMutex() });
  });

  it('should seed new players from the saved settings', async () => {
    const saved = GuildSettings.create(GuildId.from(GUILD_ID));
    saved.setVolume(70);
    saved.setRepeatMode('all');
    await settings.save(saved);

    const player = await createPlayer();

    expect(player.volume).toBe(70);
    expect(player.playlist.repeat).toBe('all');
    expect(registry.get(GUILD_ID)).toBe(player);
  });

  it('should use defaults for guilds without settings', async () => {
    const player = await createPlayer();

    expect(player.volume).toBe(100);
    expect(player.playlist.repeat).toBe('off');
  });

  it('should use defaults when settings cannot be loaded', async () => {
    settings.findByGuildId = async () => {
      throw new Error('database is locked');
    };

    const player = await createPlayer();
    expect(player.volume).toBe(100);
  });

  it('should keep one player per guild', async () => {
    const first = await createPlayer();
    const second = await createPlayer();
    await createPlayer(OTHER_GUILD_ID);

    expect(second).toBe(first);
    expect(registry.size).toBe(2);
    expect(node.connect).toHaveBeenCalledTimes(2);
  });

  it('should not keep a player whose connection failed', async () => {
    await expect(
      registry.run(GUILD_ID, () => registry.create(GUILD_ID, voiceChannel(VOICE_CHANNEL_ID, ['Speak']), TEXT_CHANNEL_ID))
    ).rejects.toThrow('I require the `speak` permission(s) to do that.');

    expect(registry.get(GUILD_ID)).toBeUndefined();
  });

  it('should route node events to the guild player in order', async () => {
    const player = await createPlayer();
    const [a, b, c] = [makeTrack('a'), makeTrack('b'), makeTrack('c')];
    player.playlist.add([a, b, c]);
    await registry.run(GUILD_ID, () => player.play(a));

    node.emit(GUILD_ID, { type: 'trackEnd', track: a, reason: 'finished' });
    node.emit(GUILD_ID, { type: 'trackEnd', track: b, reason: 'finished' });
    await registry.run(GUILD_ID, () => undefined);

    expect(node.session().played).toEqual([a, b, c]);
    expect(player.nowPlaying).toBe(c);
  });

  it('should drop events for guilds without a player', async () => {
    await expect(
      registry.dispatch(GUILD_ID, { type: 'trackStart', track: makeTrack('a') })
    ).resolves.toBeUndefined();
    expect(notifier.sent).toEqual([]);
  });

  it('should forget the player when its session closes', async () => {
    const player = await createPlayer();

    await registry.dispatch(GUILD_ID, { type: 'sessionClosed', reason: 'websocket closed' });

    expect(player.state).toBe('disconnected');
    expect(registry.get(GUILD_ID)).toBeUndefined();
  });

  it('should not reject when a player fails to handle an event', async () => {
    const player = await createPlayer();
    const a = makeTrack('a');
    player.playlist.add([a, makeTrack('b')]);
    await registry.run(GUILD_ID, () => player.play(a));
    node.session().play.mockRejectedValueOnce(new Error('node gone'));

    await expect(
      registry.dispatch(GUILD_ID, { type: 'trackEnd', track: a, reason: 'finished' })
    ).resolves.toBeUndefined();
    expect(player.state).toBe('idle');
  });

  describe('voice state policy', () => {
    it('should leave when the last listener leaves the player channel', async () => {
      await createPlayer();

      await registry.handleChannelEmptied(GUILD_ID, VOICE_CHANNEL_ID);

      expect(notifier.sent).toEqual([
        {
          channelId: TEXT_CHANNEL_ID,
          notice: { tone: 'message', description: `Disconnected from <#${VOICE_CHANNEL_ID}>.` },
        },
      ]);
      expect(registry.get(GUILD_ID)).toBeUndefined();
      expect(node.session().disconnect).toHaveBeenCalledTimes(1);
    });

    it('should ignore other channels emptying', async () => {
      await createPlayer();

      await registry.handleChannelEmptied(GUILD_ID, OTHER_VOICE_CHANNEL_ID);

      expect(registry.get(GUILD_ID)).toBeDefined();
      expect(notifier.sent).toEqual([]);
    });

    it('should follow the bot when someone else moves it', async () => {
      const player = await createPlayer();

      await registry.handleMoved(GUILD_ID, OTHER_VOICE_CHANNEL_ID);

      expect(player.voiceChannelId).toBe(OTHER_VOICE_CHANNEL_ID);
      expect(node.session().moveTo).not.toHaveBeenCalled();

      await registry.handleChannelEmptied(GUILD_ID, VOICE_CHANNEL_ID);
      expect(registry.get(GUILD_ID)).toBe(player);

      await registry.handleChannelEmptied(GUILD_ID, OTHER_VOICE_CHANNEL_ID);
      expect(registry.get(GUILD_ID)).toBeUndefined();
    });

    it('should release the player when the bot is removed from voice', async () => {
      const player = await createPlayer();

      await registry.handleForcedDisconnect(GUILD_ID);

      expect(player.state).toBe('disconnected');
      expect(registry.get(GUILD_ID)).toBeUndefined();
    });
  });

  it('should write volume and repeat mode through to the settings', async () => {
    await registry.saveVolume(GUILD_ID, 42);
    await registry.saveRepeatMode(GUILD_ID, 'track');

    const stored = await settings.findByGuildId(GuildId.from(GUILD_ID));
    expect(stored?.volume).toBe(42);
    expect(stored?.repeatMode).toBe('track');
  });

  it('should not fail commands when settings cannot be written', async () => {
    settings.save = async () => {
      throw new Error('disk full');
    };

    await expect(registry.saveVolume(GUILD_ID, 42)).resolves.toBeUndefined();
  });

  it('should destroy every player and stop listening on shutdown', async () => {
    await createPlayer();
    await createPlayer(OTHER_GUILD_ID);

    await registry.shutdown();

    expect(registry.size).toBe(0);
    expect(node.listenerCount).toBe(0);
    expect(node.session(GUILD_ID).disconnect).toHaveBeenCalledTimes(1);
    expect(node.session(OTHER_GUILD_ID).disconnect).toHaveBeenCalledTimes(1);
  });
});
