import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@c4graph/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    env: {
      DEBUG_MODE: 'true',
    },
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    exclude: ['dist/**', 'node_modules/**', 'packages/*/dist/**'],
  },
});
