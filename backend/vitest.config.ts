import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    setupFiles: ['test/setup-env.ts'],
    clearMocks: true,
    restoreMocks: true,
    // bcrypt runs on every register/login flow
    testTimeout: 15_000,
  },
});
