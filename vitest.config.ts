import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@schemalens/core': pkg('core'),
      '@schemalens/connector-db': pkg('connector-db'),
      '@schemalens/pipeline': pkg('pipeline'),
      '@schemalens/server': pkg('server'),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 15_000,
  },
});
