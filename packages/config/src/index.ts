import { z } from 'zod';

const idList = z
  .string()
  .default('')
  .transform((value) => value.split(',').map((id) => id.trim()).filter((id) => id.length > 0));

const flag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

const envSchema = z.object({
  DISCORD_TOKEN: z.string(),
  DISCORD_APPLICATION_ID: z.string(),
  // SQLite file holding guild settings and banners
  DATABASE_PATH: z.string().default('vibingway.db'),
  LAVALINK_HOST: z.string().default('localhost'),
  LAVALINK_PORT: z.coerce.number().default(2333),
  LAVALINK_PASSWORD: z.string(),
  LAVALINK_SECURE: flag,
  // Owner commands
  ADMIN_GUILD_IDS: idList,
  ADMIN_USER_IDS: idList,
  // An empty value from a copied .env.example means no webhook
  LOGGING_WEBHOOK_URL: z.preprocess((value) => (value === '' ? undefined : value), z.string().url().optional()),
  // Timeouts
  PROMPT_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  VOICE_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  IMAGE_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  // Banner rotation
  BANNER_CHECK_INTERVAL_MS: z.coerce.number().int().positive().default(300_000),
  // Prometheus scrape endpoint; 0 turns it off
  METRICS_PORT: z.coerce.number().int().min(0).default(3001),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

export const env: Env = parseEnv(process.env);
