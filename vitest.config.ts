import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    setupFiles: ['./tests/setup.ts'],
    environment: 'node',
    // Statistical suites draw a few hundred thousand values through SHA-256 mixing.
    testTimeout: 60_000,
  },
});
