import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['relay-service/test/**/*.spec.ts'],
    environment: 'node',
    testTimeout: 15_000,
  },
});
