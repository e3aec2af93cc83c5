import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    conditions: ['source'],
  },
  ssr: {
    resolve: {
      conditions: ['source'],
    },
  },
  test: {
    include: ['packages_mjs/*/tests/**/*.test.mts'],
    environment: 'node',
    globals: false,
    testTimeout: 10000,
  },
});
