import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    root,
    include: ['src/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@queens/core': path.resolve(root, '../core/src/index.ts'),
      '@queens/search': path.resolve(root, '../search/src/index.ts'),
      '@queens/analysis': path.resolve(root, '../analysis/src/index.ts'),
    },
  },
});
