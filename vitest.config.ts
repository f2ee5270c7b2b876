import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    testTimeout: 10000, // 10 second default for tests
    hookTimeout: 10000,
    include: ['tests/**/*.test.ts'],
    // SQLite files are shared per path; keep test files from racing on them
    fileParallelism: false,
    env: {
      NODE_ENV: 'test',
      PARFUME_DATA_DIR: './data/test', // Isolate tests from the local database
      PARFUME_BCRYPT_ROUNDS: '4',
      LOG_LEVEL: 'silent',
    },
    setupFiles: ['tests/fixtures/setup.ts'],
  },
});
