import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    environment: 'node',
    pool: 'forks',
    include: ['packages/*/src/**/*.test.ts', '{adapters,host,app}/**/__tests__/**/*.spec.ts'],
  },
  resolve: {
    alias: {
      // Resolve the workspace package to its sources
      '@acid-handle/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
});
