import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // keep suites quiet; tests that assert on log lines lower this themselves
    env: {
      LOG_LEVEL: 'error',
    },
  },
});
