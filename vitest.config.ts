import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

/**
 * Root vitest configuration covering every workspace.
 */
export default defineConfig({
  resolve: {
    alias: {
      '@retrace/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/src/**/*.test.ts', 'apps/**/tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/node_modules/**', '**/dist/**'],
    testTimeout: 30000,
    reporters: ['default'],
  },
});
