import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    exclude: ['dist/**', 'node_modules/**'],
    // Each PGlite database boots its own in-process Postgres
    testTimeout: 30_000,
    hookTimeout: 30_000,
    env: {
      LOG_LEVEL: 'silent',
      SESSION_SECRET: 'test-secret',
    },
  },
  resolve: {
    // Support .js extension imports in ESM TypeScript source
    extensions: ['.ts', '.js'],
  },
});
