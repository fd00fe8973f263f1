import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    env: { NODE_ENV: 'test' },
    include: ['src/**/*.test.ts'],
    setupFiles: ['src/__tests__/setup.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    restoreMocks: true,
    clearMocks: true,
    testTimeout: 10000,
  },
});
