export const REPEAT_MODES = ['off', 'all', 'track'] as const;

/**
 * `off` plays the playlist once, `all` wraps around at the end and `track`
 * repeats the current track.
 */
export type RepeatMode = (typeof REPEAT_MODES)[number];

export function isRepeatMode(value: string): value is RepeatMode {
  return REPEAT_MODES.some((mode) => mode === value);
}

export function parseRepeatMode(value: string): RepeatMode {
  const normalized = value.trim().toLowerCase();
  if (!isRepeatMode(normalized)) {
    throw new Error(`Unknown repeat mode: ${value}`);
  }
  return normalized;
}
