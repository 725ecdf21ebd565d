import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const resolveSource = (relative: string): string =>
  fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'packages/*/src/**/*.{test,spec}.ts',
      'packages/*/__tests__/**/*.{test,spec}.ts',
      'apps/*/src/**/*.{test,spec}.ts',
      'tools/**/*.{test,spec}.ts',
    ],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.d.ts',
        '**/__tests__/**',
        '**/*.test.ts',
        '**/*.config.*',
        '**/index.ts',
        'tools/run-migrations.ts',
        'tools/migration-status.ts',
      ],
    },
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      // Resolve workspace packages to their source files for testing
      '@clinistock/types': resolveSource('./packages/types/src/index.ts'),
      '@clinistock/core': resolveSource('./packages/core/src/index.ts'),
      '@clinistock/domain': resolveSource('./packages/domain/src/index.ts'),
      '@clinistock/infrastructure': resolveSource('./packages/infrastructure/src/index.ts'),
    },
  },
});
