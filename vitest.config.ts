import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Workflow tests drive fake agents, so they finish quickly
    testTimeout: 10000,

    // Setup file to run before tests
    setupFiles: ['./tests/setup.ts'],

    // Include test patterns (feature-organized: tests/{feature}/{unit,integration}/)
    include: ['tests/**/*.test.ts'],

    exclude: ['node_modules', 'dist', 'build'],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['**/*.d.ts'],
    },

    // Global variables for tests
    globals: true,
  },
});
