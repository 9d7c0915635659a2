import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['library/*/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
