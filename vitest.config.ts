import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    jsx: 'automatic'
  },
  test: {
    include: ['server/src/**/*.test.ts', 'frontend/src/**/*.test.{ts,tsx}'],
    environment: 'node',
    setupFiles: ['server/src/testing/setup.ts'],
    clearMocks: true
  }
});
