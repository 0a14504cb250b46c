import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/**/src/**/*.{test,spec}.ts', 'packages/**/src/**/*.{test,spec}.ts'],
    reporters: ['default'],
    env: { NODE_ENV: 'test' },
    coverage: {
      provider: 'v8',
      include: ['apps/*/src/**/*.ts', 'packages/*/src/**/*.ts'],
      exclude: [
        '**/*.d.ts',
        '**/*.test.ts',
        '**/index.ts',
        '**/client.ts',
        'apps/api/src/main.ts',
        'packages/types/**/*.ts',
        '**/node_modules/**',
        '**/dist/**',
      ],
      reporter: ['text', 'lcov'],
      reportsDirectory: './coverage',
    },
  },
});
