import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'backend',
    include: ['tests/**/*.test.ts'],
    testTimeout: 10_000,
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
