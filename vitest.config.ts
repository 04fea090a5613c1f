import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    globals: true,

    testTimeout: 10000,
    hookTimeout: 10000,

    clearMocks: true,
    restoreMocks: true,

    // Silences the shared logger
    setupFiles: ['./test/setup.ts'],
  },
});
