import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['node-runtime/tests/**/*.test.ts'],
    environment: 'node',
  },
});
