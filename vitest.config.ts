import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts', 'tests/**/*.spec.ts'],
    // the suffix overflow cases scan ~36k lines each
    testTimeout: 20000,
  },
});
