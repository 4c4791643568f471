import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@shared/schema': path.resolve(root, './packages/shared/schema'),
      '@lexicube/types': path.resolve(root, './packages/types'),
      '@': path.resolve(root, './mobile/src'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['mobile/src/**/*.test.ts', 'packages/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'fatal',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary', 'lcov'],
      include: ['mobile/src/**/*.ts', 'packages/**/*.ts'],
      exclude: [
        '**/*.test.ts',
        '**/__tests__/**',
        // Pure interface/type-alias files compile to empty JS
        '**/types.ts',
        'packages/types/**',
        // Composition root
        'mobile/src/app.ts',
      ],
    },
    testTimeout: 10000,
  },
});
