import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['test/**/*.test.ts'],
    server: {
      deps: {
        external: ['node:async_hooks'],
      },
    },
  },
});
