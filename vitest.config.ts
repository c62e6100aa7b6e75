import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      DEPSCOUT_LOG_LEVEL: 'silent',
    },
  },
});
