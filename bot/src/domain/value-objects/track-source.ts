import { ValidationError } from '../../errors.js';

const PLAYLIST_MARKERS = ['playlist?', '&list=', '?list'];

export type TrackSourceKind = 'playlist' | 'url' | 'search';

/**
 * Track Source Value Object
 * A user supplied search string or URL, classified by how it is resolved
 */
export class TrackSource {
  private readonly _value: string;

  constructor(value: string) {
    const trimmed = value.trim();
    if (trimmed.length === 0) {
      throw new ValidationError('Track source cannot be empty or only whitespace');
    }

    if (trimmed.length > 500) {
      throw new ValidationError('Track source cannot exceed 500 characters');
    }

    this._value = trimmed;
  }

  get value(): string {
    return this._value;
  }

  get isUrl(): boolean {
    return /^https?:\/\//i.test(this._value);
  }

  get kind(): TrackSourceKind {
    if (!this.isUrl) {
      return 'search';
    }
    return PLAYLIST_MARKERS.some((marker) => this._value.includes(marker)) ? 'playlist' : 'url';
  }

  toString(): string {
    return this._value;
  }

  /** Undefined for absent or blank input. */
  static parse(value: string | null | undefined): TrackSource | undefined {
    if (value === null || value === undefined || value.trim().length === 0) {
      return undefined;
    }
    return new TrackSource(value);
  }
}
