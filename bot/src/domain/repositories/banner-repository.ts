import type { Banner } from '../entities/banner.js';
import type { GuildId } from '../value-objects/guild-id.js';

/**
 * Banner Repository Interface
 */
export interface BannerRepository {
  /**
   * Add a banner. Resolves false when the guild already has this URL.
   */
  add(banner: Banner): Promise<boolean>;

  /**
   * Remove a banner by URL. Resolves false when nothing was removed.
   */
  remove(guildId: GuildId, url: string): Promise<boolean>;

  /**
   * All banners of a guild in the order they were added
   */
  findByGuild(guildId: GuildId): Promise<Banner[]>;
}
