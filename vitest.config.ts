/**
 * Vitest configuration
 *
 * Unit tests live in tests/unit, end-to-end runs of the dump pipeline in
 * tests/integration. Both use real temporary directories.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    testTimeout: 30000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/index.ts', 'src/cli/bin.ts'],
    },
  },
})
