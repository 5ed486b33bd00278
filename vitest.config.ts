import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'incident-atlas',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    environment: 'node',
    testTimeout: 5_000,
    env: {
      // keep pipeline logging out of test output
      LOG_LEVEL: 'error',
    },
  },
});
