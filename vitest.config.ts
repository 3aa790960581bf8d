import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true,
    env: {
      MCP_LOG_LEVEL: 'silent',
    },
  },
});
