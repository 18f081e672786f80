import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/__tests__/**/*.test.ts'],
    setupFiles: ['packages/advisor-core/__tests__/setup.ts'],
    exclude: ['node_modules', 'dist'],
    coverage: {
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', '**/__tests__/**'],
    },
    testTimeout: 10000,
    teardownTimeout: 5000,
  },
});
