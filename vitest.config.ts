/**
 * Vitest Configuration
 *
 * One run covers every package:
 * - core: chainmark library tests
 * - cli: chainmark-cli tests
 *
 * `chainmark` resolves to the core sources so tests need no build first.
 */
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      chainmark: fileURLToPath(
        new URL('./packages/core/src/index.ts', import.meta.url)
      ),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/core/src/index.ts'],
    },
  },
});
