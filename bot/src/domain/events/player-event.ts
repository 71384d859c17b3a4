import type { Track } from '../entities/track.js';

/** Why the node stopped playing a track. */
export type TrackEndReason = 'finished' | 'loadFailed' | 'stopped' | 'replaced' | 'cleanup';

/**
 * Playback events reported by the audio node for one guild, handled in the
 * order they were emitted. `track` is null when the node sent no usable
 * track payload.
 */
export type PlayerEvent =
  | { type: 'trackStart'; track: Track | null }
  | { type: 'trackEnd'; track: Track | null; reason: TrackEndReason }
  | { type: 'trackError'; track: Track | null; error: string }
  | { type: 'trackStuck'; track: Track | null; thresholdMs: number }
  | { type: 'sessionClosed'; reason: string };

/** End reasons after which the next track should play. */
export function shouldAdvance(reason: TrackEndReason): boolean {
  return reason !== 'stopped' && reason !== 'replaced';
}
