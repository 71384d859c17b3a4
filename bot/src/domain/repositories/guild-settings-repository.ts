import type { GuildSettings } from '../entities/guild-settings.js';
import type { GuildId } from '../value-objects/guild-id.js';

/**
 * Guild Settings Repository Interface
 * Defines contract for persisting guild settings
 */
export interface GuildSettingsRepository {
  /**
   * Find guild settings by guild ID
   */
  findByGuildId(guildId: GuildId): Promise<GuildSettings | null>;

  /**
   * Save guild settings
   */
  save(settings: GuildSettings): Promise<void>;

  /**
   * Find the guilds among `guildIds` that have banner rotation enabled
   */
  findWithBannerRotationEnabled(guildIds: readonly string[]): Promise<GuildSettings[]>;
}
