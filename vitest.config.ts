import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['agents/**/*.test.ts', 'coordinator/**/*.test.ts', 'orchestration/**/*.test.ts', 'mcp/**/*.test.ts'],
    environment: 'node',
    testTimeout: 15000,
    pool: 'forks',
    env: {
      COORD_LOG_SILENT: 'true',
    },
  },
});
