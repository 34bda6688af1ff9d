// vitest.config.ts
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globalSetup: './suite/global-setup.ts',

    // Isolated scenarios chdir; worker threads reject process.chdir, forks do not.
    // One fork keeps scenarios (and their working directories) strictly sequential.
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
    include: ['test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    sequence: {
      concurrent: false,
      shuffle: false,
      hooks: 'list',
    },

    // Don't bail on first failure; we want a full run summary
    bail: 0,

    testTimeout: 120_000,
    hookTimeout: 120_000,
  },
});
