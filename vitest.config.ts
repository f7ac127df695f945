import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    // Test environment
    environment: 'node',

    // Pins NODE_ENV, LOG_LEVEL and POSTMARK_* for every test file
    setupFiles: ['./test/setup/test-setup.ts'],

    // Test patterns
    include: [
      'test/**/*.test.ts',
      'test/**/*.spec.ts'
    ],
    exclude: [
      'node_modules',
      'dist'
    ],

    testTimeout: 10000,
    hookTimeout: 10000,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      reportsDirectory: './coverage',
      exclude: [
        'node_modules/**',
        'dist/**',
        'test/**',
        '**/*.test.ts',
        'src/scripts/**', // Demo entry point is run manually
        'src/types/**'
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80
      }
    },

    // Watch mode
    watch: false
  }
});
