import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    // Channel and resolver tests spawn real subprocesses with deadlines.
    testTimeout: 20_000,
  },
});
