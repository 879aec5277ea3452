import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // Workspace packages resolve to their TypeScript sources under this condition.
    conditions: ['development'],
  },
  test: {
    include: ['packages/**/src/**/*.test.ts'],
    exclude: ['**/dist/**', '**/node_modules/**'],
  },
});
