import type { LavalinkManager, LavalinkNode, Player } from 'lavalink-client';
import { createLogger } from '@vibingway/logger';
import type {
  AudioNode,
  AudioNodeListener,
  AudioSession,
  LoadResult,
  VoiceConnectOptions,
} from '../../application/ports/audio-node.js';
import { Track } from '../../domain/entities/track.js';
import type { PlayerEvent, TrackEndReason } from '../../domain/events/player-event.js';
import { AudioError, errorMessage } from '../../errors.js';

const log = createLogger('lavalink');

/**
 * Track shape shared by search results (`info.duration`) and raw event
 * payloads (`info.length`).
 */
export interface NodeTrack {
  encoded?: string | null;
  info: {
    identifier: string;
    title: string;
    author: string;
    duration?: number;
    length?: number;
    artworkUrl?: string | null;
    uri?: string | null;
    isStream: boolean;
    sourceName: string;
  };
}

export interface NodeSearchResult {
  loadType: string;
  tracks: readonly NodeTrack[];
  playlist: { name?: string; title?: string } | null;
  exception: { message?: string | null } | null;
}

export function toTrack(raw: NodeTrack | null | undefined): Track | null {
  if (!raw?.encoded) {
    return null;
  }
  const { info } = raw;
  return Track.create(raw.encoded, {
    identifier: info.identifier,
    title: info.title,
    author: info.author,
    uri: info.uri ?? null,
    durationMs: info.duration ?? info.length ?? 0,
    artworkUrl: info.artworkUrl ?? null,
    isStream: info.isStream,
    sourceName: info.sourceName,
  });
}

export function toLoadResult(result: NodeSearchResult): LoadResult {
  const tracks = result.tracks.map(toTrack).filter((track): track is Track => track !== null);

  switch (result.loadType) {
    case 'track':
      return tracks.length > 0 ? { type: 'track', tracks } : { type: 'empty' };
    case 'playlist':
      return { type: 'playlist', name: result.playlist?.name ?? result.playlist?.title ?? 'Playlist', tracks };
    case 'search':
      return tracks.length > 0 ? { type: 'search', tracks } : { type: 'empty' };
    case 'error':
      return { type: 'error', message: result.exception?.message ?? 'Unknown error' };
    default:
      return { type: 'empty' };
  }
}

const END_REASONS: readonly TrackEndReason[] = ['finished', 'loadFailed', 'stopped', 'replaced', 'cleanup'];

export function toEndReason(reason: string | undefined): TrackEndReason {
  const normalized = END_REASONS.find((candidate) => candidate.toLowerCase() === reason?.toLowerCase());
  return normalized ?? 'finished';
}

class LavalinkSession implements AudioSession {
  constructor(private readonly player: Player) {}

  get guildId(): string {
    return this.player.guildId;
  }

  async play(track: Track): Promise<void> {
    await this.player.play({ track: { encoded: track.encoded }, paused: false });
  }

  async pause(): Promise<void> {
    await this.player.pause();
  }

  async resume(): Promise<void> {
    await this.player.resume();
  }

  async stop(): Promise<void> {
    await this.player.stopPlaying(false, false);
  }

  async setVolume(percent: number): Promise<void> {
    await this.player.setVolume(percent);
  }

  async seek(positionMs: number): Promise<void> {
    await this.player.seek(positionMs);
  }

  position(): number {
    return this.player.position;
  }

  async moveTo(voiceChannelId: string): Promise<void> {
    await this.player.changeVoiceState({ voiceChannelId });
  }

  async disconnect(): Promise<void> {
    await this.player.destroy('disconnected');
  }
}

/**
 * AudioNode backed by a lavalink-client manager. Manager events are
 * translated into PlayerEvents and fanned out to subscribers.
 */
export class LavalinkAudioNode implements AudioNode {
  private readonly listeners = new Set<AudioNodeListener>();

  constructor(private readonly manager: LavalinkManager) {
    manager.on('trackStart', (player, _track, payload) =>
      this.emit(player.guildId, { type: 'trackStart', track: toTrack(payload.track) }));

    manager.on('trackEnd', (player, _track, payload) =>
      this.emit(player.guildId, {
        type: 'trackEnd',
        track: toTrack(payload.track),
        reason: toEndReason(payload.reason),
      }));

    manager.on('trackError', (player, _track, payload) =>
      this.emit(player.guildId, {
        type: 'trackError',
        track: toTrack(payload.track),
        error: payload.exception?.message ?? 'Unknown error',
      }));

    manager.on('trackStuck', (player, _track, payload) =>
      this.emit(player.guildId, {
        type: 'trackStuck',
        track: toTrack(payload.track),
        thresholdMs: payload.thresholdMs,
      }));

    manager.on('playerDisconnect', (player, voiceChannelId) =>
      this.emit(player.guildId, { type: 'sessionClosed', reason: `disconnected from ${voiceChannelId}` }));

    manager.on('playerDestroy', (player, reason) =>
      this.emit(player.guildId, { type: 'sessionClosed', reason: reason ?? 'destroyed' }));
  }

  isReady(): boolean {
    return this.availableNode() !== undefined;
  }

  resolve(identifier: string): Promise<LoadResult> {
    return this.load(identifier, undefined);
  }

  search(query: string): Promise<LoadResult> {
    return this.load(query, 'ytsearch');
  }

  async connect(options: VoiceConnectOptions): Promise<AudioSession> {
    const player = this.manager.createPlayer({
      guildId: options.guildId,
      voiceChannelId: options.voiceChannelId,
      textChannelId: options.textChannelId,
      selfDeaf: true,
      volume: options.volume,
    });

    try {
      await player.connect();
    } catch (error) {
      await player.destroy('connect failed').catch((destroyError: unknown) =>
        log.warn({ guildId: options.guildId, error: errorMessage(destroyError) }, 'Unable to clean up player'));
      throw new AudioError('Failed to connect to voice channel', options.guildId, { cause: error });
    }

    return new LavalinkSession(player);
  }

  onEvent(listener: AudioNodeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private async load(query: string, source: 'ytsearch' | undefined): Promise<LoadResult> {
    const node = this.availableNode();
    if (!node) {
      return { type: 'error', message: 'No audio node is connected' };
    }

    try {
      const result = await node.search(source ? { query, source } : { query }, 'vibingway');
      return toLoadResult(result);
    } catch (error) {
      log.error({ query, error: errorMessage(error) }, 'Track loading failed');
      return { type: 'error', message: errorMessage(error) };
    }
  }

  private availableNode(): LavalinkNode | undefined {
    return [...this.manager.nodeManager.nodes.values()].find((node) => node.connected);
  }

  private emit(guildId: string, event: PlayerEvent): void {
    log.debug({ guildId, type: event.type }, 'Node event');
    for (const listener of this.listeners) {
      listener(guildId, event);
    }
  }
}
