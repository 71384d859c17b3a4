import { createLogger } from '@vibingway/logger';
import { GuildSettings } from '../../domain/entities/guild-settings.js';
import type { PlayerEvent } from '../../domain/events/player-event.js';
import type { GuildSettingsRepository } from '../../domain/repositories/guild-settings-repository.js';
import { GuildId } from '../../domain/value-objects/guild-id.js';
import type { RepeatMode } from '../../domain/value-objects/repeat-mode.js';
import { errorMessage } from '../../errors.js';
import { guildMutex, type GuildMutex, type GuildMutexTask } from '../../guildMutex.js';
import { activePlayersGauge, nodeEventCounter } from '../../metrics.js';
import type { AudioNode } from '../ports/audio-node.js';
import { notice, type Notifier } from '../ports/notifier.js';
import { PlaylistPlayer, channelMention, type VoiceChannelRef } from './playlist-player.js';

const log = createLogger('player-registry');

export interface PlayerRegistryOptions {
  node: AudioNode;
  notifier: Notifier;
  settings: GuildSettingsRepository;
  mutex?: GuildMutex;
  connectTimeoutMs?: number;
}

/**
 * Owns at most one player per guild and serializes every piece of work for
 * a guild, node events included, through the guild mutex.
 */
export class PlayerRegistry {
  private readonly players = new Map<string, PlaylistPlayer>();
  private readonly mutex: GuildMutex;
  private readonly unsubscribe: () => void;

  constructor(private readonly options: PlayerRegistryOptions) {
    this.mutex = options.mutex ?? guildMutex;
    this.unsubscribe = options.node.onEvent((guildId, event) => {
      void this.dispatch(guildId, event);
    });
  }

  get size(): number {
    return this.players.size;
  }

  get(guildId: string): PlaylistPlayer | undefined {
    return this.players.get(guildId);
  }

  /** Run `task` exclusively for the guild. */
  run<T>(guildId: string, task: GuildMutexTask<T>): Promise<T> {
    return this.mutex.run(guildId, task);
  }

  /**
   * Return the guild's player, creating and connecting one seeded from the
   * persisted volume and repeat mode. Call from inside run().
   */
  async create(guildId: string, voiceChannel: VoiceChannelRef, textChannelId: string): Promise<PlaylistPlayer> {
    const existing = this.players.get(guildId);
    if (existing) {
      return existing;
    }

    const settings = await this.loadSettings(guildId);
    const player = await PlaylistPlayer.create({
      guildId,
      voiceChannel,
      textChannelId,
      node: this.options.node,
      notifier: this.options.notifier,
      volume: settings.volume,
      repeat: settings.repeatMode,
      connectTimeoutMs: this.options.connectTimeoutMs,
    });

    this.players.set(guildId, player);
    activePlayersGauge.set(this.players.size);
    log.info({ guildId, voiceChannelId: voiceChannel.id }, 'Player created');
    return player;
  }

  /** Disconnect and forget the guild's player. Call from inside run(). */
  async destroy(guildId: string): Promise<void> {
    const player = this.players.get(guildId);
    if (!player) {
      return;
    }
    this.players.delete(guildId);
    activePlayersGauge.set(this.players.size);
    await player.disconnect();
    log.info({ guildId }, 'Player destroyed');
  }

  /**
   * Route a node event to the guild's player in emission order. Never
   * rejects; failures are logged.
   */
  async dispatch(guildId: string, event: PlayerEvent): Promise<void> {
    nodeEventCounter.labels(event.type, event.type === 'trackEnd' ? event.reason : '').inc();

    try {
      await this.run(guildId, async () => {
        const player = this.players.get(guildId);
        if (!player) {
          log.debug({ guildId, type: event.type }, 'Dropping event for guild without player');
          return;
        }

        await player.handleEvent(event);

        if (event.type === 'sessionClosed' && this.players.get(guildId) === player) {
          this.players.delete(guildId);
          activePlayersGauge.set(this.players.size);
        }
      });
    } catch (error) {
      log.error({ guildId, type: event.type, error: errorMessage(error) }, 'Failed to handle player event');
    }
  }

  /**
   * The last human left `channelId`. A player in that channel announces it
   * is leaving and disconnects.
   */
  async handleChannelEmptied(guildId: string, channelId: string): Promise<void> {
    await this.run(guildId, async () => {
      const player = this.players.get(guildId);
      if (!player || player.voiceChannelId !== channelId) {
        return;
      }
      await player.notify(notice.message(`Disconnected from ${channelMention(channelId)}.`));
      await this.destroy(guildId);
    });
  }

  /** The bot was removed from voice by someone else. */
  async handleForcedDisconnect(guildId: string): Promise<void> {
    await this.run(guildId, () => this.destroy(guildId));
  }

  /** Someone else moved the bot to `channelId`. */
  async handleMoved(guildId: string, channelId: string): Promise<void> {
    await this.run(guildId, () => {
      this.players.get(guildId)?.channelChanged(channelId);
    });
  }

  async saveVolume(guildId: string, volume: number): Promise<void> {
    await this.updateSettings(guildId, (settings) => settings.setVolume(volume));
  }

  async saveRepeatMode(guildId: string, mode: RepeatMode): Promise<void> {
    await this.updateSettings(guildId, (settings) => settings.setRepeatMode(mode));
  }

  async shutdown(): Promise<void> {
    this.unsubscribe();
    const guildIds = [...this.players.keys()];
    await Promise.all(guildIds.map((guildId) => this.run(guildId, () => this.destroy(guildId))));
    log.info({ players: guildIds.length }, 'Player registry shut down');
  }

  private async loadSettings(guildId: string): Promise<GuildSettings> {
    const id = GuildId.from(guildId);
    try {
      return (await this.options.settings.findByGuildId(id)) ?? GuildSettings.create(id);
    } catch (error) {
      log.error({ guildId, error: errorMessage(error) }, 'Failed to load guild settings, using defaults');
      return GuildSettings.create(id);
    }
  }

  /**
   * Write-through of player settings. The live player already changed, so a
   * failed write is logged rather than surfaced to the command.
   */
  private async updateSettings(guildId: string, mutate: (settings: GuildSettings) => void): Promise<void> {
    try {
      const settings = await this.loadSettings(guildId);
      mutate(settings);
      await this.options.settings.save(settings);
    } catch (error) {
      log.error({ guildId, error: errorMessage(error) }, 'Failed to persist player settings');
    }
  }
}
