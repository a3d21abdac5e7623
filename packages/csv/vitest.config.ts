import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'csv',
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
