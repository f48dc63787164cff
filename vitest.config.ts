import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['unique-files/src/**/*.test.ts'],
    environment: 'node'
  }
});
