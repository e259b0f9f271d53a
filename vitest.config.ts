import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test file patterns
    include: ['src/**/*.test.ts'],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'html'],
      reportsDirectory: './coverage',

      include: ['src/**/*.ts'],

      // Exclude test files and index re-exports
      exclude: [
        'src/**/*.test.ts',
        'src/**/index.ts',
        'src/cli.ts', // CLI is hard to test
      ],

      thresholds: {
        statements: 70,
        branches: 60,
        functions: 70,
        lines: 70,
      },
    },

    testTimeout: 10000,

    environment: 'node',
  },
});
