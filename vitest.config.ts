import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: false,
    include: ['tests/**/*.test.ts'],
    coverage: {
      exclude: ['scripts/**', 'vitest.config.ts', 'dist/**'],
    },
  },
});
