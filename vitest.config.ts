import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

/**
 * Shared Vitest configuration for the stylelens packages.
 *
 * `stylelens-core` is aliased to its TypeScript sources so the CLI tests run
 * without a build of the core package.
 */
export default defineConfig({
  resolve: {
    alias: {
      'stylelens-core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    testTimeout: 20000,
  },
});
