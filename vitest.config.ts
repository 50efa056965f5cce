import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    projects: ['packages/*'],
    coverage: {
      provider: 'v8',
      exclude: ['**/dist/**', '**/node_modules/**', '**/*.d.ts'],
      include: ['packages/*/src/**/*.ts'],
    },
  },
});
