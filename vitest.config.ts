import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts', 'apps/*/tests/**/*.test.ts'],
    exclude: ['dist/**', 'node_modules/**'],
  },
  resolve: {
    alias: {
      '@todo-api/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      '@todo-api/server': fileURLToPath(new URL('./apps/server/src/app.ts', import.meta.url)),
    },
  },
});
