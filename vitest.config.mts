import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    include: ['packages/**/__tests__/**/*.test.ts'],

    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],

    pool: 'threads',
    fileParallelism: true,

    testTimeout: 30000,
    hookTimeout: 30000,

    // ===================================================================
    // COVERAGE CONFIGURATION (enable with --coverage)
    // ===================================================================

    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'lcov'],
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        '**/__tests__/**',
        '**/*.test.ts',
        '**/node_modules/**',
        '**/dist/**',
      ],
    },

    reporters: ['default'],

    watch: false,

    // ===================================================================
    // MOCKING & STUBBING
    // ===================================================================

    restoreMocks: true,
    clearMocks: true,
  },
});
