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
      reporter: ['text', 'html'],

      // Core services only; commands and TUI are thin wrappers
      include: [
        'src/lib/inventory-parser.ts',
        'src/lib/inventory-adapter.ts',
        'src/lib/variant-detector.ts',
        'src/lib/usage-store.ts',
        'src/lib/model-view-engine.ts',
        'src/lib/deletion-queue.ts',
      ],

      exclude: ['**/*.test.ts', '**/node_modules/**', '**/dist/**', '**/tests/**'],

      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },

    // Mock configuration
    clearMocks: true,
    restoreMocks: true,

    // Setup file
    setupFiles: ['./tests/setup.ts'],

    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
