import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['vfs/src/**/*.test.ts'],
    environment: 'node',
  },
});
