import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration for the Leave Orchestration Service
 *
 * Runs unit and HTTP integration tests in a Node.js environment. No test
 * touches a real database, SMTP server or remote API: the ledger runs
 * in-memory and adapters are faked or served by a stubbed fetch.
 */
export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Global test setup
    globals: true,
    setupFiles: ['./tests/setup.ts'],

    // Test file patterns
    include: [
      'tests/**/*.test.ts',
    ],

    exclude: [
      'node_modules/**',
      'dist/**',
    ],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: [
        'src/server.ts',
        'src/index.ts',
        'src/db/seed.ts',
      ],
    },

    testTimeout: 10000,
    hookTimeout: 10000,

    reporters: ['default'],

    // Mock reset behavior
    clearMocks: true,
    restoreMocks: true,

    sequence: {
      shuffle: false,
    },
  },
});
