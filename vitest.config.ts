import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    include: ['aws/**/src/**/*.test.ts'],

    exclude: ['node_modules', 'dist'],

    testTimeout: 10000,
    hookTimeout: 10000,

    watch: false,

    clearMocks: true,
    restoreMocks: true,
  },
});
