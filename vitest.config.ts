import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Test file patterns
    include: ['src/**/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist', 'examples/**'],

    testTimeout: 10000,

    // Mock reset
    clearMocks: true,
    restoreMocks: true,
  },
});
