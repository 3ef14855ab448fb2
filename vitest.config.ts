import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'runtime/*/src/**/*.test.ts'],
    environment: 'node',
  },
});
