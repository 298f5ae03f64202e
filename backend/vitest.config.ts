import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    setupFiles: ['test/setup-env.ts'],
    clearMocks: true,
    restoreMocks: true,
    // Each e2e file boots an in-process Postgres.
    testTimeout: 20_000,
    hookTimeout: 20_000,
  },
});
