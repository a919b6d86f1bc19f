import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import path from 'node:path';

const here = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    name: 'puzzle',
    root: here,
    include: ['src/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@runelock/core': path.resolve(here, '../core/src/index.ts'),
      '@runelock/puzzle': path.resolve(here, './src/index.ts'),
    },
  },
});
