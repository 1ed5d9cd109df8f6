import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    globals: true,
    testTimeout: 30000,
  },
  resolve: {
    alias: {
      '@roleradar/agents': fromRoot('./agents/src/index.ts'),
      '@roleradar/core': fromRoot('./packages/core/src/index.ts'),
      '@roleradar/llm': fromRoot('./packages/llm/src/index.ts'),
      '@roleradar/schemas': fromRoot('./packages/schemas/src/index.ts'),
    },
  },
});
