export interface TrackInfo {
  identifier: string;
  title: string;
  author: string;
  uri: string | null;
  durationMs: number;
  artworkUrl: string | null;
  isStream: boolean;
  sourceName: string;
}

/**
 * Track Entity
 * Node-resolved reference to a playable item. Immutable once created.
 */
export class Track {
  private constructor(
    private readonly _encoded: string,
    private readonly _info: Readonly<TrackInfo>
  ) {}

  get encoded(): string {
    return this._encoded;
  }

  get identifier(): string {
    return this._info.identifier;
  }

  get title(): string {
    return this._info.title;
  }

  get author(): string {
    return this._info.author;
  }

  get uri(): string | null {
    return this._info.uri;
  }

  get durationMs(): number {
    return this._info.durationMs;
  }

  get artworkUrl(): string | null {
    return this._info.artworkUrl;
  }

  get isStream(): boolean {
    return this._info.isStream;
  }

  get sourceName(): string {
    return this._info.sourceName;
  }

  /** Two references are the same track when the node encoded them identically. */
  equals(other: Track): boolean {
    return this._encoded === other._encoded;
  }

  static create(encoded: string, info: TrackInfo): Track {
    if (!encoded) {
      throw new Error('Track must carry an encoded identifier');
    }
    return new Track(encoded, { ...info, title: info.title || 'Unknown title' });
  }

  toData(): { encoded: string } & TrackInfo {
    return { encoded: this._encoded, ...this._info };
  }
}
