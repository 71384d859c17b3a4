import { ValidationError } from '../../errors.js';
import { GuildId } from '../value-objects/guild-id.js';
import { isRepeatMode, type RepeatMode } from '../value-objects/repeat-mode.js';

export const MIN_VOLUME = 0;
export const MAX_VOLUME = 150;
export const DEFAULT_VOLUME = 100;
export const DEFAULT_BANNER_INTERVAL = 30;
export const MIN_BANNER_INTERVAL = 5;

export interface GuildSettingsData {
  guildId: string;
  volume?: number;
  repeatMode?: string;
  bannerRotationEnabled?: boolean;
  bannerInterval?: number;
  lastBannerChange?: Date | null;
}

/**
 * Guild Settings Entity
 * Player defaults restored on every new player, plus banner rotation settings
 */
export class GuildSettings {
  constructor(
    private readonly _guildId: GuildId,
    private _volume: number = DEFAULT_VOLUME,
    private _repeatMode: RepeatMode = 'off',
    private _bannerRotationEnabled: boolean = false,
    private _bannerInterval: number = DEFAULT_BANNER_INTERVAL,
    private _lastBannerChange: Date | null = null
  ) {
    this.validateVolume(_volume);
    this.validateBannerInterval(_bannerInterval);
  }

  get guildId(): GuildId {
    return this._guildId;
  }

  get volume(): number {
    return this._volume;
  }

  get repeatMode(): RepeatMode {
    return this._repeatMode;
  }

  get bannerRotationEnabled(): boolean {
    return this._bannerRotationEnabled;
  }

  /** Minutes between automatic banner changes. */
  get bannerInterval(): number {
    return this._bannerInterval;
  }

  get lastBannerChange(): Date | null {
    return this._lastBannerChange;
  }

  setVolume(volume: number): void {
    this.validateVolume(volume);
    this._volume = volume;
  }

  setRepeatMode(mode: RepeatMode): void {
    this._repeatMode = mode;
  }

  enableBannerRotation(): void {
    this._bannerRotationEnabled = true;
  }

  disableBannerRotation(): void {
    this._bannerRotationEnabled = false;
  }

  setBannerInterval(minutes: number): void {
    this.validateBannerInterval(minutes);
    this._bannerInterval = minutes;
  }

  markBannerChanged(at: Date = new Date()): void {
    this._lastBannerChange = at;
  }

  /**
   * Rotation is due once the interval has elapsed since the last change. A
   * guild whose banner was never changed is always due.
   */
  isBannerRotationDue(now: Date = new Date()): boolean {
    if (!this._bannerRotationEnabled) {
      return false;
    }
    if (!this._lastBannerChange) {
      return true;
    }
    return now.getTime() - this._lastBannerChange.getTime() >= this._bannerInterval * 60_000;
  }

  private validateVolume(volume: number): void {
    if (!Number.isInteger(volume) || volume < MIN_VOLUME || volume > MAX_VOLUME) {
      throw new ValidationError(`Volume must be an integer between ${MIN_VOLUME} and ${MAX_VOLUME}`);
    }
  }

  private validateBannerInterval(minutes: number): void {
    if (!Number.isInteger(minutes) || minutes < MIN_BANNER_INTERVAL) {
      throw new ValidationError(`Banner interval must be an integer of at least ${MIN_BANNER_INTERVAL} minutes`);
    }
  }

  static create(guildId: GuildId): GuildSettings {
    return new GuildSettings(guildId);
  }

  static fromData(data: GuildSettingsData): GuildSettings {
    const repeatMode = data.repeatMode !== undefined && isRepeatMode(data.repeatMode) ? data.repeatMode : 'off';

    return new GuildSettings(
      GuildId.from(data.guildId),
      data.volume ?? DEFAULT_VOLUME,
      repeatMode,
      data.bannerRotationEnabled ?? false,
      data.bannerInterval ?? DEFAULT_BANNER_INTERVAL,
      data.lastBannerChange ?? null
    );
  }

  toData(): Required<GuildSettingsData> & { repeatMode: RepeatMode } {
    return {
      guildId: this._guildId.value,
      volume: this._volume,
      repeatMode: this._repeatMode,
      bannerRotationEnabled: this._bannerRotationEnabled,
      bannerInterval: this._bannerInterval,
      lastBannerChange: this._lastBannerChange
    };
  }
}
