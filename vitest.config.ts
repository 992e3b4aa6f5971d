import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@chessboard/shared': fileURLToPath(new URL('./packages/shared/src/index.ts', import.meta.url))
    }
  },
  esbuild: {
    jsx: 'automatic'
  },
  test: {
    environment: 'node',
    include: ['apps/*/src/**/*.test.{ts,tsx}', 'packages/*/src/**/*.test.ts'],
    // bcrypt hashing in auth tests is slow on shared CI runners
    testTimeout: 15_000
  }
});
