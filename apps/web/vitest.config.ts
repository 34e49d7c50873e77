import { defineConfig } from 'vitest/config';
import path from 'path';

const pkg = (dir: string) => path.resolve(__dirname, '../../packages', dir, 'src');

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@shepherd/shared': pkg('shared'),
      '@shepherd/db': pkg('db'),
      '@shepherd/core': pkg('core'),
      '@shepherd/module-membership': pkg('modules/membership'),
      '@shepherd/module-families': pkg('modules/families'),
      '@shepherd/module-groups': pkg('modules/groups'),
      '@shepherd/module-finance': pkg('modules/finance'),
      '@shepherd/module-volunteers': pkg('modules/volunteers'),
      '@': path.resolve(__dirname, './src'),
    },
  },
});
