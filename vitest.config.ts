import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test discovery
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    // Environment
    environment: 'node',
    globals: true,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],

      // Session engine only; the blessed view and CLI wiring are exercised by hand
      include: ['src/lib/**/*.ts', 'src/tui/presentation.ts', 'src/tui/input-line.ts'],
      exclude: ['**/*.test.ts', '**/node_modules/**', '**/dist/**', '**/tests/**'],

      thresholds: {
        lines: 85,
        functions: 85,
        branches: 80,
        statements: 85,

        'src/lib/session-reducer.ts': {
          lines: 95,
          functions: 95,
          branches: 90,
          statements: 95,
        },
      },
    },

    // Mock configuration
    clearMocks: true,

    // Setup file
    setupFiles: ['./tests/setup.ts'],

    // Timeout configuration
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
