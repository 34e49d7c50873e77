import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  resolve: {
    alias: {
      '@shepherd/shared': path.resolve(__dirname, '../../shared/src'),
      '@shepherd/db': path.resolve(__dirname, '../../db/src'),
      '@shepherd/core': path.resolve(__dirname, '../../core/src'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    testTimeout: 10_000,
  },
});
