import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.spec.ts', 'providers/*/tests/**/*.spec.ts'],
    testTimeout: 30_000,
  },
});
