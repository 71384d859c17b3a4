import { instrumentQuery, type SqliteDatabase } from '@vibingway/database';
import { Banner } from '../../domain/entities/banner.js';
import type { BannerRepository } from '../../domain/repositories/banner-repository.js';
import type { GuildId } from '../../domain/value-objects/guild-id.js';

interface BannerRow {
  id: number;
  guild_id: string;
  user_id: string;
  url: string;
}

export class SqliteBannerRepository implements BannerRepository {
  constructor(private readonly db: SqliteDatabase) {}

  async add(banner: Banner): Promise<boolean> {
    const data = banner.toData();
    const result = instrumentQuery('insert', 'banners', () =>
      this.db
        .prepare('INSERT OR IGNORE INTO banners (guild_id, user_id, url) VALUES (?, ?, ?)')
        .run(data.guildId, data.userId, data.url));
    return result.changes > 0;
  }

  async remove(guildId: GuildId, url: string): Promise<boolean> {
    const result = instrumentQuery('delete', 'banners', () =>
      this.db.prepare('DELETE FROM banners WHERE guild_id = ? AND url = ?').run(guildId.value, url));
    return result.changes > 0;
  }

  async findByGuild(guildId: GuildId): Promise<Banner[]> {
    const rows = instrumentQuery('select', 'banners', () =>
      this.db
        .prepare<[string], BannerRow>('SELECT id, guild_id, user_id, url FROM banners WHERE guild_id = ? ORDER BY id')
        .all(guildId.value));

    return rows.map((row) => Banner.fromData({ id: row.id, guildId: row.guild_id, userId: row.user_id, url: row.url }));
  }
}
