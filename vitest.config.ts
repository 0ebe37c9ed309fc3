import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: 'node',
    globals: true,
    include: [
      'packages/*/__tests__/**/*.{test,spec}.ts',
      'apps/*/__tests__/**/*.{test,spec}.ts',
    ],
    testTimeout: 15000,
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts', 'apps/*/src/**/*.ts'],
      exclude: ['**/__tests__/**', '**/*.test.*', '**/*.spec.*'],
    },
  },
});
