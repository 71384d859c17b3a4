import { beforeEach, describe, expect, it, vi } from 'vitest';

describe('env', () => {
  beforeEach(() => {
    vi.resetModules();
    process.env.DISCORD_TOKEN = 'token';
    process.env.DISCORD_APPLICATION_ID = '123456789012345678';
    process.env.LAVALINK_PASSWORD = 'pass';
  });

  it('parses variables', async () => {
    const { env } = await import('../src/index.js');
    expect(env.DISCORD_TOKEN).toBe('token');
    expect(env.LAVALINK_PORT).toBe(2333);
    expect(env.PROMPT_TIMEOUT_MS).toBe(60000);
  });
});

describe('parseEnv', () => {
  const base = {
    DISCORD_TOKEN: 'token',
    DISCORD_APPLICATION_ID: '123456789012345678',
    LAVALINK_PASSWORD: 'pass',
  };

  it('applies defaults', async () => {
    const { parseEnv } = await import('../src/index.js');
    const parsed = parseEnv({ ...base });

    expect(parsed.DATABASE_PATH).toBe('vibingway.db');
    expect(parsed.LAVALINK_HOST).toBe('localhost');
    expect(parsed.LAVALINK_SECURE).toBe(false);
    expect(parsed.ADMIN_USER_IDS).toEqual([]);
    expect(parsed.BANNER_CHECK_INTERVAL_MS).toBe(300000);
    expect(parsed.LOG_LEVEL).toBe('info');
    expect(parsed.METRICS_PORT).toBe(3001);
  });

  it('splits comma separated id lists', async () => {
    const { parseEnv } = await import('../src/index.js');
    const parsed = parseEnv({ ...base, ADMIN_GUILD_IDS: '111, 222,,333 ' });

    expect(parsed.ADMIN_GUILD_IDS).toEqual(['111', '222', '333']);
  });

  it('reads boolean flags literally', async () => {
    const { parseEnv } = await import('../src/index.js');

    expect(parseEnv({ ...base, LAVALINK_SECURE: 'true' }).LAVALINK_SECURE).toBe(true);
    expect(parseEnv({ ...base, LAVALINK_SECURE: 'false' }).LAVALINK_SECURE).toBe(false);
  });

  it('coerces numeric values', async () => {
    const { parseEnv } = await import('../src/index.js');
    const parsed = parseEnv({ ...base, LAVALINK_PORT: '2444', PROMPT_TIMEOUT_MS: '5000' });

    expect(parsed.LAVALINK_PORT).toBe(2444);
    expect(parsed.PROMPT_TIMEOUT_MS).toBe(5000);
  });

  it('accepts 0 as a disabled metrics port', async () => {
    const { parseEnv } = await import('../src/index.js');

    expect(parseEnv({ ...base, METRICS_PORT: '0' }).METRICS_PORT).toBe(0);
    expect(() => parseEnv({ ...base, METRICS_PORT: '-1' })).toThrow();
  });

  it('rejects a missing token', async () => {
    const { parseEnv } = await import('../src/index.js');

    expect(() => parseEnv({ DISCORD_APPLICATION_ID: '1', LAVALINK_PASSWORD: 'pass' })).toThrow();
  });

  it('rejects an invalid webhook url', async () => {
    const { parseEnv } = await import('../src/index.js');

    expect(() => parseEnv({ ...base, LOGGING_WEBHOOK_URL: 'not a url' })).toThrow();
  });

  it('treats an empty webhook url as unset', async () => {
    const { parseEnv } = await import('../src/index.js');

    expect(parseEnv({ ...base, LOGGING_WEBHOOK_URL: '' }).LOGGING_WEBHOOK_URL).toBeUndefined();
  });
});
