import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      thresholds: {
        lines: 85,
        functions: 85,
        branches: 80,
        statements: 85,
      },
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.d.ts',
        '**/__tests__/**',
        '**/vitest.config.ts',
        '**/*.test.ts',
        '**/coverage/**',
        '**/*.config.*',
        '**/index.ts',
      ],
    },
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      // Resolve workspace packages to their source files for testing
      '@rateboard/core': path.resolve(rootDir, 'packages/core/src/index.ts'),
      '@rateboard/domain': path.resolve(rootDir, 'packages/domain/src/index.ts'),
      '@rateboard/application': path.resolve(rootDir, 'packages/application/src/index.ts'),
      '@rateboard/infrastructure': path.resolve(rootDir, 'packages/infrastructure/src/index.ts'),
    },
  },
});
