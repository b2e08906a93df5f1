import { defineConfig } from 'vitest/config';
export default defineConfig({
  test: {
    globals: true,
    include: ['packages/*/__tests__/**/*.spec.ts'],
    environment: 'node',
    testTimeout: 20_000,
  }
});
