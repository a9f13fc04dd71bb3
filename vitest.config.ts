import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.test.ts', 'examples/*/tests/**/*.test.ts'],
    environment: 'node',
    env: {
      STEPWISE_LOG_LEVEL: 'silent',
    },
    testTimeout: 15000,
  },
});
