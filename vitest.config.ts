import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.test.ts', 'servers/*/tests/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent'
    },
    clearMocks: true,
    restoreMocks: true,
    testTimeout: 10000
  }
});
