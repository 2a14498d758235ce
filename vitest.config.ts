import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/tests/**/*.spec.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      QUIET: '1',
    },
  },
});
