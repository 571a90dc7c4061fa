import { defineConfig } from 'vitest/config';

// Workspace-wide Vitest configuration.
// Workspace packages resolve to their TypeScript sources, so no build runs first.
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    // Include patterns
    include: [
      'packages/**/__tests__/**/*.test.ts',
      'apps/**/__tests__/**/*.test.ts',
    ],

    // Exclude patterns
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],

    // ===================================================================
    // EXECUTION
    // ===================================================================

    pool: 'threads',
    fileParallelism: true,

    testTimeout: 10000,
    hookTimeout: 10000,

    watch: false,

    // ===================================================================
    // MOCKING & STUBBING
    // ===================================================================

    mockReset: false,
    restoreMocks: true,
    clearMocks: true,

    retry: 0,
    bail: 0,
  },
});
