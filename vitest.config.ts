import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));
const pool = process.env.VITEST_POOL === 'threads' ? 'threads' : 'forks';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    env: {
      NODE_ENV: 'test'
    },
    include: ['packages/*/test/**/*.test.ts', 'bot/test/**/*.test.ts'],
    setupFiles: ['./tests/setup.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
    pool
  },
  resolve: {
    alias: {
      '@vibingway/config': path.resolve(root, 'packages/config/src/index.ts'),
      '@vibingway/logger': path.resolve(root, 'packages/logger/src/index.ts'),
      '@vibingway/database': path.resolve(root, 'packages/database/src/index.ts')
    }
  }
});
