import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// Workspace packages export compiled dist/ at run time; tests load their sources
const source = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@solbench\/core$/, replacement: source('./packages/core/src/index.ts') },
      {
        find: /^@solbench\/core\/debug-logger$/,
        replacement: source('./packages/core/src/debug-logger.ts'),
      },
    ],
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
  },
});
