import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Keep scope-prefixed console output out of the reporter
    silent: true,
  },
});
