import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const root = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
    },
    include: ['packages/*/test/**/*.test.ts', 'audio/test/**/*.test.ts', 'tests/**/*.test.ts'],
    setupFiles: ['./tests/setup.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
    pool: 'forks',
  },
  resolve: {
    alias: {
      '@strata/logger': root('./packages/logger/src/index.ts'),
      '@strata/config': root('./packages/config/src/index.ts'),
      '@strata/cache': root('./packages/cache/src/index.ts'),
      '@strata/audio': root('./audio/src/index.ts'),
    },
  },
});
