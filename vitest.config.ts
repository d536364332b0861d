import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    conditions: ['commonroom-source'],
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.test.ts',
        'packages/*/src/**/index.ts',
        'packages/core/src/types/**/*.ts',
      ],
    },
  },
});
