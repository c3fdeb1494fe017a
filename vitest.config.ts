import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const source = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@chesslens/rules': source('rules'),
      '@chesslens/engine': source('engine'),
      '@chesslens/test-utils': source('test-utils'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20000,
  },
});
