import { instrumentQuery, runInTransaction, type SqliteDatabase } from '@vibingway/database';
import { GuildSettings } from '../../domain/entities/guild-settings.js';
import type { GuildSettingsRepository } from '../../domain/repositories/guild-settings-repository.js';
import type { GuildId } from '../../domain/value-objects/guild-id.js';

interface QueueSettingsRow {
  guild_id: string;
  repeat: string;
  volume: number;
}

interface BannerSettingsRow {
  guild_id: string;
  enabled: number;
  interval: number;
  last_change: number | null;
}

/**
 * SQLite implementation of GuildSettingsRepository. Player settings live in
 * `queue_settings`, banner settings in `banner_settings`.
 */
export class SqliteGuildSettingsRepository implements GuildSettingsRepository {
  constructor(private readonly db: SqliteDatabase) {}

  async findByGuildId(guildId: GuildId): Promise<GuildSettings | null> {
    try {
      const queue = instrumentQuery('select', 'queue_settings', () =>
        this.db
          .prepare<[string], QueueSettingsRow>('SELECT guild_id, repeat, volume FROM queue_settings WHERE guild_id = ?')
          .get(guildId.value));
      const banner = instrumentQuery('select', 'banner_settings', () =>
        this.db
          .prepare<[string], BannerSettingsRow>(
            'SELECT guild_id, enabled, interval, last_change FROM banner_settings WHERE guild_id = ?'
          )
          .get(guildId.value));

      if (!queue && !banner) {
        return null;
      }

      return toSettings(guildId.value, queue, banner);
    } catch (error) {
      throw new Error(`Failed to find guild settings: ${error instanceof Error ? error.message : 'Unknown error'}`, {
        cause: error,
      });
    }
  }

  async save(settings: GuildSettings): Promise<void> {
    const data = settings.toData();

    try {
      runInTransaction(this.db, 'save-guild-settings', () => {
        instrumentQuery('upsert', 'queue_settings', () =>
          this.db
            .prepare(
              `INSERT INTO queue_settings (guild_id, repeat, volume) VALUES (@guildId, @repeat, @volume)
               ON CONFLICT (guild_id) DO UPDATE SET repeat = excluded.repeat, volume = excluded.volume`
            )
            .run({ guildId: data.guildId, repeat: data.repeatMode, volume: data.volume }));

        instrumentQuery('upsert', 'banner_settings', () =>
          this.db
            .prepare(
              `INSERT INTO banner_settings (guild_id, enabled, interval, last_change)
               VALUES (@guildId, @enabled, @interval, @lastChange)
               ON CONFLICT (guild_id) DO UPDATE SET
                 enabled = excluded.enabled, interval = excluded.interval, last_change = excluded.last_change`
            )
            .run({
              guildId: data.guildId,
              enabled: data.bannerRotationEnabled ? 1 : 0,
              interval: data.bannerInterval,
              lastChange: data.lastBannerChange ? data.lastBannerChange.getTime() : null,
            }));
      });
    } catch (error) {
      throw new Error(`Failed to save guild settings: ${error instanceof Error ? error.message : 'Unknown error'}`, {
        cause: error,
      });
    }
  }

  async findWithBannerRotationEnabled(guildIds: readonly string[]): Promise<GuildSettings[]> {
    if (guildIds.length === 0) {
      return [];
    }

    try {
      const placeholders = guildIds.map(() => '?').join(', ');
      const banners = instrumentQuery('select', 'banner_settings', () =>
        this.db
          .prepare<string[], BannerSettingsRow>(
            `SELECT guild_id, enabled, interval, last_change FROM banner_settings
             WHERE enabled = 1 AND guild_id IN (${placeholders})`
          )
          .all(...guildIds));

      const queueStatement = this.db.prepare<[string], QueueSettingsRow>(
        'SELECT guild_id, repeat, volume FROM queue_settings WHERE guild_id = ?'
      );

      return banners.map((banner) =>
        toSettings(
          banner.guild_id,
          instrumentQuery('select', 'queue_settings', () => queueStatement.get(banner.guild_id)),
          banner
        ));
    } catch (error) {
      throw new Error(
        `Failed to find banner rotation guilds: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { cause: error }
      );
    }
  }
}

function toSettings(
  guildId: string,
  queue: QueueSettingsRow | undefined,
  banner: BannerSettingsRow | undefined
): GuildSettings {
  return GuildSettings.fromData({
    guildId,
    volume: queue?.volume,
    repeatMode: queue?.repeat,
    bannerRotationEnabled: banner ? banner.enabled === 1 : undefined,
    bannerInterval: banner?.interval,
    lastBannerChange: banner?.last_change != null ? new Date(banner.last_change) : null,
  });
}
