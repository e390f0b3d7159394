import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    setupFiles: ['./tests/setup.ts'],
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    globals: true,
    testTimeout: 10000,
    // createAnthropicClient builds the fake in tests/mocks/anthropic.ts
    alias: {
      '@anthropic-ai/sdk': fileURLToPath(new URL('./tests/mocks/anthropic.ts', import.meta.url)),
    },
  },
});
