import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['core/tests/**/*.spec.ts'],
    environment: 'node',
    testTimeout: 10_000,
  },
});
