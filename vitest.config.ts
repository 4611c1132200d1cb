import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    coverage: {
      reporter: ['text', 'html', 'lcov'],
      reportsDirectory: './test-output/vitest/coverage',
      exclude: ['node_modules/**', 'dist/**', 'src/test/**', 'examples/**'],
      include: ['src/**/*.ts'],
    },
    testTimeout: 30000,
    hookTimeout: 10000,
  },
});
