import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'agent',
    globals: true,
    testTimeout: 10000,
    include: ['__tests__/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      exclude: ['node_modules/**', 'dist/**', '**/*.test.ts', '**/__tests__/**', 'bin/**'],
    },
  },
});
