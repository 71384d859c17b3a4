import { createLogger } from '@vibingway/logger';
import { Playlist } from '../../domain/entities/playlist.js';
import type { Track } from '../../domain/entities/track.js';
import { MAX_VOLUME, MIN_VOLUME } from '../../domain/entities/guild-settings.js';
import { shouldAdvance, type PlayerEvent } from '../../domain/events/player-event.js';
import type { RepeatMode } from '../../domain/value-objects/repeat-mode.js';
import { BotMissingPermissionsError, InvalidStateError, TimeoutError, errorMessage } from '../../errors.js';
import { withTimeout } from '../../util.js';
import type { AudioNode, AudioSession } from '../ports/audio-node.js';
import { notice, type Notice, type Notifier } from '../ports/notifier.js';

const log = createLogger('player');

export type PlayerState = 'disconnected' | 'connecting' | 'idle' | 'playing' | 'paused';

/**
 * A voice channel together with the permissions the bot lacks in it.
 */
export interface VoiceChannelRef {
  id: string;
  name: string;
  missingPermissions: string[];
}

export interface PlayerOptions {
  guildId: string;
  voiceChannel: VoiceChannelRef;
  textChannelId: string;
  node: AudioNode;
  notifier: Notifier;
  volume?: number;
  repeat?: RepeatMode;
  connectTimeoutMs?: number;
}

export const DEFAULT_CONNECT_TIMEOUT_MS = 15_000;

export function channelMention(channelId: string): string {
  return `<#${channelId}>`;
}

export function trackLink(track: Track): string {
  return track.uri ? `[${track.title}](${track.uri})` : track.title;
}

/**
 * Binds a guild's playlist to a voice session and reacts to the node's
 * playback events. All calls are expected to run under the guild's mutex.
 */
export class PlaylistPlayer {
  readonly playlist: Playlist<Track>;
  private session: AudioSession | null = null;
  private _state: PlayerState = 'connecting';
  private _nowPlaying: Track | undefined;
  private _voiceChannelId: string;
  private _volume: number;
  private pendingPlay: Promise<void> = Promise.resolve();
  // The track under the cursor replaced a removed head and has not played yet.
  private headPending = false;

  constructor(private readonly options: PlayerOptions) {
    this.playlist = new Playlist<Track>(options.repeat ?? 'off');
    this._voiceChannelId = options.voiceChannel.id;
    this._volume = clampVolume(options.volume ?? 100);
  }

  /**
   * Check permissions, then open the voice session. The player is idle once
   * this resolves.
   */
  static async create(options: PlayerOptions): Promise<PlaylistPlayer> {
    const player = new PlaylistPlayer(options);
    await player.connect();
    return player;
  }

  get guildId(): string {
    return this.options.guildId;
  }

  get state(): PlayerState {
    return this._state;
  }

  get voiceChannelId(): string {
    return this._voiceChannelId;
  }

  get textChannelId(): string {
    return this.options.textChannelId;
  }

  get volume(): number {
    return this._volume;
  }

  get nowPlaying(): Track | undefined {
    return this.isActive ? this._nowPlaying : undefined;
  }

  get isConnected(): boolean {
    return this._state !== 'disconnected' && this._state !== 'connecting';
  }

  /** A track is loaded, whether playing or paused. */
  get isActive(): boolean {
    return this._state === 'playing' || this._state === 'paused';
  }

  get isPaused(): boolean {
    return this._state === 'paused';
  }

  /** Playback position of the loaded track in milliseconds. */
  get elapsedMs(): number {
    return this.session && this.isActive ? this.session.position() : 0;
  }

  async connect(): Promise<void> {
    if (this._state !== 'connecting') {
      throw new InvalidStateError(`Cannot connect a player that is ${this._state}`);
    }

    const { voiceChannel, node } = this.options;
    if (voiceChannel.missingPermissions.length > 0) {
      this._state = 'disconnected';
      throw new BotMissingPermissionsError(voiceChannel.missingPermissions);
    }

    const connecting = node.connect({
      guildId: this.guildId,
      voiceChannelId: voiceChannel.id,
      textChannelId: this.options.textChannelId,
      volume: this._volume,
    });

    try {
      this.session = await withTimeout(
        connecting,
        this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
        'voice connect',
      );
    } catch (error) {
      this._state = 'disconnected';
      if (error instanceof TimeoutError) {
        this.closeLateSession(connecting);
      }
      throw error;
    }

    this._state = 'idle';
    log.info({ guildId: this.guildId, voiceChannelId: voiceChannel.id }, 'Player connected');
  }

  /**
   * Stream `track`. A play issued while another is still being established
   * waits for it to finish.
   */
  async play(track: Track): Promise<void> {
    this.requireSession('play');

    const run = this.pendingPlay.then(() => this.startPlayback(track));
    // The chain only orders plays; callers see failures through `run`.
    this.pendingPlay = run.catch(() => undefined);
    return run;
  }

  /**
   * Advance the playlist and play what is under the cursor. Resolves
   * undefined, leaving the state alone, when there is nothing next.
   */
  async playNext(): Promise<Track | undefined> {
    this.requireSession('play the next track');

    const head = this.headPending ? this.playlist.current() : undefined;
    if (head) {
      await this.play(head);
      return head;
    }
    if (!this.playlist.hasNext()) {
      return undefined;
    }
    const next = this.playlist.advance();
    if (!next) {
      return undefined;
    }
    await this.play(next);
    return next;
  }

  /** Whether playNext() has something to play. */
  hasNext(): boolean {
    return (this.headPending && this.playlist.current() !== undefined) || this.playlist.hasNext();
  }

  /**
   * Remove the track at a zero-based index. When the track under the cursor
   * at index 0 goes, the cursor cannot move back, so the track that slides
   * into its place is played next instead of being advanced past.
   */
  removeTrack(index: number): Track | undefined {
    const headRemoved = index === 0 && this.playlist.position === 0;
    const removed = this.playlist.remove(index);
    if (removed && headRemoved && !this.playlist.isEmpty()) {
      this.headPending = true;
    }
    return removed;
  }

  async pause(): Promise<void> {
    const session = this.requireSession('pause');
    if (this._state !== 'playing') {
      throw new InvalidStateError(`Cannot pause a player that is ${this._state}`);
    }
    await session.pause();
    this._state = 'paused';
  }

  async resume(): Promise<void> {
    const session = this.requireSession('resume');
    if (this._state !== 'paused') {
      throw new InvalidStateError(`Cannot resume a player that is ${this._state}`);
    }
    await session.resume();
    this._state = 'playing';
  }

  /** Halt playback without moving the cursor. */
  async stop(): Promise<void> {
    const session = this.requireSession('stop');
    if (this.isActive) {
      await session.stop();
    }
    this._state = 'idle';
    this._nowPlaying = undefined;
  }

  /** Returns the applied volume, clamped into 0-150. */
  async setVolume(percent: number): Promise<number> {
    const session = this.requireSession('change the volume');
    const volume = clampVolume(percent);
    await session.setVolume(volume);
    this._volume = volume;
    return volume;
  }

  setRepeat(mode: RepeatMode): void {
    this.requireSession('change the repeat mode');
    this.playlist.setRepeat(mode);
  }

  async seek(positionMs: number): Promise<number> {
    const session = this.requireSession('seek');
    const track = this.nowPlaying;
    if (!track) {
      throw new InvalidStateError('Cannot seek without a loaded track');
    }
    if (track.isStream) {
      throw new InvalidStateError('Cannot seek in a live stream');
    }
    const target = Math.min(Math.max(Math.trunc(positionMs), 0), track.durationMs);
    await session.seek(target);
    return target;
  }

  async moveTo(voiceChannel: VoiceChannelRef): Promise<void> {
    const session = this.requireSession('move');
    if (voiceChannel.missingPermissions.length > 0) {
      throw new BotMissingPermissionsError(voiceChannel.missingPermissions);
    }
    await session.moveTo(voiceChannel.id);
    this._voiceChannelId = voiceChannel.id;
  }

  /** Someone else moved the bot; follow it without touching the session. */
  channelChanged(voiceChannelId: string): void {
    if (this._state === 'disconnected') {
      return;
    }
    log.info({ guildId: this.guildId, from: this._voiceChannelId, to: voiceChannelId }, 'Moved to another voice channel');
    this._voiceChannelId = voiceChannelId;
  }

  /** Tear the session down. Terminal: every later operation fails. */
  async disconnect(): Promise<void> {
    if (this._state === 'disconnected') {
      return;
    }
    const session = this.session;
    this.markDisconnected();

    if (session) {
      try {
        await session.disconnect();
      } catch (error) {
        log.warn({ guildId: this.guildId, error: errorMessage(error) }, 'Voice session did not close cleanly');
      }
    }
  }

  async notify(message: Notice): Promise<void> {
    try {
      await this.options.notifier.send(this.options.textChannelId, message);
    } catch (error) {
      log.error({ guildId: this.guildId, error: errorMessage(error) }, 'Unable to send notification');
    }
  }

  async handleEvent(event: PlayerEvent): Promise<void> {
    if (this._state === 'disconnected') {
      return;
    }

    switch (event.type) {
      case 'trackStart': {
        const track = event.track ?? this._nowPlaying;
        log.info({ guildId: this.guildId, title: track?.title }, 'Track started');
        if (track) {
          await this.notify(notice.message(`Now playing ${trackLink(track)}.`));
        }
        return;
      }

      case 'trackEnd':
        log.info({ guildId: this.guildId, title: event.track?.title, reason: event.reason }, 'Track ended');
        if (shouldAdvance(event.reason) && this.isCurrent(event.track)) {
          await this.continuePlayback();
        }
        return;

      case 'trackError':
        log.warn({ guildId: this.guildId, title: event.track?.title, error: event.error }, 'Track failed');
        if (this.isCurrent(event.track)) {
          await this.continuePlayback();
        }
        return;

      case 'trackStuck':
        log.warn({ guildId: this.guildId, title: event.track?.title, thresholdMs: event.thresholdMs }, 'Track stuck');
        if (this.isCurrent(event.track)) {
          await this.continuePlayback();
        }
        return;

      case 'sessionClosed':
        log.info({ guildId: this.guildId, reason: event.reason }, 'Voice session closed');
        this.markDisconnected();
        return;
    }
  }

  private async startPlayback(track: Track): Promise<void> {
    const session = this.requireSession('play');
    await session.play(track);
    this._nowPlaying = track;
    this._state = 'playing';
    this.headPending = false;
  }

  /** A connect that lost the race may still produce a session; close it. */
  private closeLateSession(connecting: Promise<AudioSession>): void {
    void connecting
      .then(
        (late) => late.disconnect(),
        () => undefined
      )
      .catch((error: unknown) =>
        log.warn({ guildId: this.guildId, error: errorMessage(error) }, 'Late voice session did not close cleanly'));
  }

  /**
   * An end/error/stuck event only moves the playlist when it concerns the
   * loaded track. Events for a track that was already replaced are dropped.
   */
  private isCurrent(track: Track | null): boolean {
    if (!this.isActive || !this._nowPlaying) {
      return false;
    }
    return track === null || track.equals(this._nowPlaying);
  }

  private async continuePlayback(): Promise<void> {
    let next: Track | undefined;
    try {
      next = await this.playNext();
    } finally {
      if (!next && this.isConnected) {
        this._state = 'idle';
        this._nowPlaying = undefined;
      }
    }
  }

  private markDisconnected(): void {
    this._state = 'disconnected';
    this._nowPlaying = undefined;
    this.session = null;
  }

  private requireSession(operation: string): AudioSession {
    if (!this.session || !this.isConnected) {
      throw new InvalidStateError(`Cannot ${operation}: the player is ${this._state}`);
    }
    return this.session;
  }
}

export function clampVolume(percent: number): number {
  return Math.min(Math.max(Math.round(percent), MIN_VOLUME), MAX_VOLUME);
}
