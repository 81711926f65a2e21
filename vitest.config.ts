import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['services/*/test/**/*.test.ts'],
    environment: 'node',
    // process.chdir() is not available inside worker threads
    pool: 'forks',
  },
});
