import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    coverage: {
      exclude: ['dist/**', 'data/**', 'vitest.config.ts'],
    },
  },
});
