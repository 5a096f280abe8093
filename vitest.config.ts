import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration.
 *
 * Tests live beside the sources under `__tests__/` and run against in-process
 * collaborator fakes only. Logging is silenced in `vitest.setup.ts`; tests
 * that assert on log output spy on `console` and raise the level themselves.
 */
export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
    pool: 'forks',
  },
});
