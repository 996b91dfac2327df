import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/**/src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '.test-tmp/**'],
    // end-to-end tests start node processes
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
});
