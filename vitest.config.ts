import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['encoder/tests/**/*.test.ts'],
    environment: 'node',
  },
});
