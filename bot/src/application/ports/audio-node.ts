import type { Track } from '../../domain/entities/track.js';
import type { PlayerEvent } from '../../domain/events/player-event.js';

/**
 * Outcome of asking the node to load an identifier or run a search.
 */
export type LoadResult =
  | { type: 'track'; tracks: Track[] }
  | { type: 'playlist'; name: string; tracks: Track[] }
  | { type: 'search'; tracks: Track[] }
  | { type: 'empty' }
  | { type: 'error'; message: string };

export interface VoiceConnectOptions {
  guildId: string;
  voiceChannelId: string;
  textChannelId: string;
  volume: number;
}

/**
 * A live voice connection streaming from the node for one guild.
 */
export interface AudioSession {
  readonly guildId: string;
  play(track: Track): Promise<void>;
  pause(): Promise<void>;
  resume(): Promise<void>;
  stop(): Promise<void>;
  setVolume(percent: number): Promise<void>;
  seek(positionMs: number): Promise<void>;
  /** Playback position of the loaded track in milliseconds. */
  position(): number;
  moveTo(voiceChannelId: string): Promise<void>;
  disconnect(): Promise<void>;
}

export type AudioNodeListener = (guildId: string, event: PlayerEvent) => void;

/**
 * Audio Node Port
 * The decoding/streaming server and the voice sessions it drives
 */
export interface AudioNode {
  isReady(): boolean;
  /** Load a URL: a single track or a remote playlist. */
  resolve(identifier: string): Promise<LoadResult>;
  /** Free text search. */
  search(query: string): Promise<LoadResult>;
  connect(options: VoiceConnectOptions): Promise<AudioSession>;
  /** Subscribe to playback events of every guild. Returns an unsubscribe function. */
  onEvent(listener: AudioNodeListener): () => void;
}
