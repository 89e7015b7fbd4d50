import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['backend/src/**/*.test.ts'],
    restoreMocks: true,
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
