import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/transfer/**/*.ts'],
      exclude: [
        'src/transfer/__tests__/**',
        'src/transfer/testing/**',
        'src/transfer/index.ts', // Re-exports only
        'src/transfer/types.ts', // Type definitions only
      ],
    },
    testTimeout: 30000,
  },
});
