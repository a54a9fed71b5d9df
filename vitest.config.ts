import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['scripts/**/*.test.ts'],
    // SQLite-backed tests share the test-data/ directory
    fileParallelism: false
  }
});
