import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    // Signal-table tests touch process-wide listeners; keep each file in its own process.
    pool: 'forks',
  },
});
