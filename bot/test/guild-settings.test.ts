import { describe, expect, it } from 'vitest';
import { Banner } from '../src/domain/entities/banner.js';
import { GuildSettings } from '../src/domain/entities/guild-settings.js';
import { GuildId } from '../src/domain/value-objects/guild-id.js';
import { ValidationError } from '../src/errors.js';
import { GUILD_ID } from './fakes.js';

const guildId = GuildId.from(GUILD_ID);

describe('GuildSettings', () => {
  it('should start with the defaults', () => {
    expect(GuildSettings.create(guildId).toData()).toEqual({
      guildId: GUILD_ID,
      volume: 100,
      repeatMode: 'off',
      bannerRotationEnabled: false,
      bannerInterval: 30,
      lastBannerChange: null,
    });
  });

  it('should validate volume and interval', () => {
    const settings = GuildSettings.create(guildId);
    expect(() => settings.setVolume(151)).toThrow(ValidationError);
    expect(() => settings.setVolume(10.5)).toThrow('Volume must be an integer between 0 and 150');
    expect(() => settings.setBannerInterval(4)).toThrow('Banner interval must be an integer of at least 5 minutes');
  });

  it('should fall back to repeat off for unknown stored modes', () => {
    expect(GuildSettings.fromData({ guildId: GUILD_ID, repeatMode: 'sometimes' }).repeatMode).toBe('off');
  });

  describe('isBannerRotationDue', () => {
    const now = new Date('2026-01-01T12:00:00Z');

    it('should never be due while rotation is off', () => {
      expect(GuildSettings.create(guildId).isBannerRotationDue(now)).toBe(false);
    });

    it('should be due when the banner was never changed', () => {
      const settings = GuildSettings.create(guildId);
      settings.enableBannerRotation();
      expect(settings.isBannerRotationDue(now)).toBe(true);
    });

    it('should be due once the interval has elapsed', () => {
      const settings = GuildSettings.create(guildId);
      settings.enableBannerRotation();

      settings.markBannerChanged(new Date('2026-01-01T11:30:01Z'));
      expect(settings.isBannerRotationDue(now)).toBe(false);

      settings.markBannerChanged(new Date('2026-01-01T11:30:00Z'));
      expect(settings.isBannerRotationDue(now)).toBe(true);
    });
  });
});

describe('GuildId', () => {
  it('should accept snowflakes only', () => {
    expect(GuildId.from(GUILD_ID).value).toBe(GUILD_ID);
    expect(() => GuildId.from('1234')).toThrow('Guild ID must be a valid Discord snowflake (17-20 digits)');
    expect(() => GuildId.from('')).toThrow('Guild ID must be a non-empty string');
  });
});

describe('Banner', () => {
  it('should accept http and https urls', () => {
    expect(Banner.create(guildId, '1', 'http://example.com/a.png').url).toBe('http://example.com/a.png');
    expect(() => Banner.create(guildId, '1', 'ftp://example.com/a.png')).toThrow('Banner URL must use http or https');
    expect(() => Banner.create(guildId, '1', 'a.png')).toThrow('Banner URL must be a valid URL');
  });
});
