import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for every workspace package
 */
export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'packages/*/src/**/*.test.ts',
      'apps/*/src/**/*.test.ts',
    ],
    exclude: ['node_modules', 'dist'],
    clearMocks: true,
    mockReset: true,
    restoreMocks: true,
    env: {
      NODE_ENV: 'test',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary', 'lcov'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.d.ts',
        '**/*.config.*',
        '**/__tests__/**',
        '**/index.ts',
      ],
    },
  },
});
