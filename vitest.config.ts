import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    // process.chdir() in the settings tests needs child processes, not worker threads
    pool: 'forks',
    testTimeout: 30_000,
  },
});
