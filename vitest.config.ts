import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    testTimeout: 30000,
    // Plain console output so assertions see text, not ANSI escapes
    env: { FORCE_COLOR: '0' },
  },
});
