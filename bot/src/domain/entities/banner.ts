import { GuildId } from '../value-objects/guild-id.js';

/**
 * Banner Entity
 * An image URL a guild member added to the guild's banner rotation
 */
export class Banner {
  private constructor(
    private readonly _id: number | null,
    private readonly _guildId: GuildId,
    private readonly _userId: string,
    private readonly _url: string
  ) {}

  /** Database id, null until persisted. */
  get id(): number | null {
    return this._id;
  }

  get guildId(): GuildId {
    return this._guildId;
  }

  get userId(): string {
    return this._userId;
  }

  get url(): string {
    return this._url;
  }

  static create(guildId: GuildId, userId: string, url: string): Banner {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new Error('Banner URL must be a valid URL');
    }
    if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
      throw new Error('Banner URL must use http or https');
    }
    return new Banner(null, guildId, userId, url);
  }

  static fromData(data: { id: number; guildId: string; userId: string; url: string }): Banner {
    return new Banner(data.id, GuildId.from(data.guildId), data.userId, data.url);
  }

  toData(): { id: number | null; guildId: string; userId: string; url: string } {
    return {
      id: this._id,
      guildId: this._guildId.value,
      userId: this._userId,
      url: this._url
    };
  }
}
