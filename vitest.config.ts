import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'geojson-model',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['packages/geojson-model/src/__tests__/setup.ts'],
    environment: 'node',
    testTimeout: 5_000,
    globals: true,
    retry: 0,
  },
});
