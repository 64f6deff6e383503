import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/test/**/*.test.ts', 'apps/*/test/**/*.test.ts'],
    environment: 'node',
    // better-sqlite3 is a native addon; keep each file in its own process
    pool: 'forks',
    testTimeout: 10000,
  },
});
