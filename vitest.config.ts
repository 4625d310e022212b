import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

function workspace(path: string): string {
  return fileURLToPath(new URL(path, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      // Workspace packages resolve to their TypeScript sources
      '@pgpsig/kernel': workspace('./packages/kernel/src/index.ts'),
      '@pgpsig/wire': workspace('./packages/wire/src/index.ts'),
      '@pgpsig/signature': workspace('./packages/signature/src/index.ts'),
    },
  },
  test: {
    root: '.',
    exclude: ['**/node_modules/**', '**/dist/**'],
    include: ['packages/*/tests/**/*.test.ts', 'packages/*/src/__tests__/**/*.test.ts'],
    env: {
      PGPSIG_LOG_LEVEL: 'silent',
    },
    testTimeout: 10000,
    bail: process.env.CI ? 1 : 0,
  },
});
