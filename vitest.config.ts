import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      AUTOMATOR_BRIDGE_LOG_LEVEL: 'silent',
    },
  },
});
