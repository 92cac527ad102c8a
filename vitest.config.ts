import path from 'node:path';

import { defineConfig } from 'vitest/config';

const packageSource = (name: string): string => path.resolve(__dirname, 'packages', name, 'src');

export default defineConfig({
  resolve: {
    alias: {
      '@querywright/core': packageSource('core'),
      '@querywright/postgresql': packageSource('postgresql'),
      '@querywright/mysql': packageSource('mysql'),
      '@querywright/sqlite': packageSource('sqlite'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    restoreMocks: false,
  },
});
