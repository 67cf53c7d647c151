import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Test file patterns
    include: ['pushbullet/typescript/src/**/__tests__/**/*.test.ts'],

    // Exclude patterns
    exclude: ['node_modules', 'dist', '**/examples/**'],

    // Test timeout
    testTimeout: 10000,
    hookTimeout: 10000,

    // Mock reset
    clearMocks: true,
    restoreMocks: true,
  },
});
