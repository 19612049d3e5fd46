import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: [
      'packages/*/tests/**/*.test.ts',
      'packages/*/src/**/__tests__/**/*.test.ts',
      'apps/*/tests/**/*.test.ts'
    ]
  },
  resolve: {
    alias: {
      '@wikirag/core': fileURLToPath(new URL('./packages/wikirag-core/src', import.meta.url)),
      '@wikirag/retrieval': fileURLToPath(new URL('./packages/retrieval/src', import.meta.url)),
      '@wikirag/test-utils': fileURLToPath(new URL('./packages/test-utils/src', import.meta.url))
    }
  }
});
