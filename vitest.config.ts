import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/**/src/**/*.{test,spec}.ts', 'packages/**/src/**/*.{test,spec}.ts'],
    reporters: ['default'],
    coverage: {
      provider: 'v8',
      include: ['apps/*/src/**/*.ts', 'packages/*/src/**/*.ts'],
      exclude: [
        '**/*.d.ts',
        '**/*.test.ts',
        '**/index.ts',
        '**/node_modules/**',
        '**/types.ts',
        'packages/types/**/*.ts',
        'apps/api/src/main.ts',
        '**/coverage/**',
        '**/dist/**',
      ],
      thresholds: {
        lines: 80,
        branches: 70,
        functions: 80,
        statements: 80,
      },
      reporter: ['text', 'lcov'],
      reportsDirectory: './coverage',
      cleanOnRerun: true,
    },
  },
});
