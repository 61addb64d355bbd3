import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@campaign-agent/shared': source('./packages/shared/src/index.ts'),
      '@campaign-agent/storage': source('./packages/core/storage/src/index.ts'),
      '@campaign-agent/agent': source('./packages/core/agent/src/index.ts'),
      '@campaign-agent/core': source('./packages/core/src/index.ts'),
    },
  },
  test: {
    include: ['packages/**/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
  },
});
