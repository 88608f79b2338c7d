import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Tests use isolated temporary directories, so they can run in parallel
    fileParallelism: true,
    maxConcurrency: 4,
    isolate: true,

    // Include patterns
    include: ['tests/**/*.test.ts'],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/cli/retrieve.ts', 'node_modules/**', 'dist/**', 'tests/**'],
    },

    testTimeout: 30000,

    // Globals
    globals: true,
  },
});
