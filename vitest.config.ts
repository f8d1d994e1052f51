import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['core/src/**/*.test.ts', 'backends/src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
  },
  resolve: {
    alias: [
      {
        find: '@layoutsmith/core',
        replacement: new URL('./core/src/index.ts', import.meta.url).pathname,
      },
      {
        find: '@layoutsmith/backends',
        replacement: new URL('./backends/src/index.ts', import.meta.url).pathname,
      },
    ],
  },
});
