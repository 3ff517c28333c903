import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/__tests__/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
    pool: 'forks',
    poolOptions: {
      forks: {
        // share-manager tests force collection of dropped managers
        execArgv: ['--expose-gc'],
      },
    },
  },
});
