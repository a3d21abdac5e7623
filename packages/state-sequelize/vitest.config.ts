import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'state-sequelize',
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
