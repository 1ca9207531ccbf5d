import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@formscan/core': new URL('./packages/core/src/index.ts', import.meta.url).pathname,
      '@formscan/midi': new URL('./packages/midi/src/index.ts', import.meta.url).pathname,
      '@formscan/report': new URL('./packages/report/src/index.ts', import.meta.url).pathname,
    },
  },
  test: {
    include: ['packages/**/*.test.ts', 'apps/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['packages/*/src/**/*.ts', 'apps/*/src/**/*.ts'],
      exclude: ['**/*.test.ts', 'apps/cli/src/main.ts'],
      thresholds: {
        lines: 85,
        branches: 85,
        functions: 85,
        statements: 85,
      },
    },
  },
});
