import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@poolbook/shared': fileURLToPath(
        new URL('./packages/poolbook-shared/src/index.ts', import.meta.url)
      ),
      '@poolbook/services': fileURLToPath(
        new URL('./packages/poolbook-services/src/index.ts', import.meta.url)
      ),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
    },
  },
});
