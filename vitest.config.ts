import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    coverage: {
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', '**/__tests__/**'],
    },
    testTimeout: 10000,
    // Keep test output to failures unless a test configures the logger itself
    env: {
      AGENT_LOG_LEVEL: 'error',
    },
  },
});
