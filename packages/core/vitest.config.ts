import { defineConfig } from 'vitest/config';

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    name: 'core',
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],
    setupFiles: ['./test/setup.ts'],
    // Million-step known-answer runs and property tests need headroom
    testTimeout: isCI ? 60000 : 30000,
    retry: 0,
    env: {
      FC_NUM_RUNS: isCI ? '200' : '50',
    },
  },
});
