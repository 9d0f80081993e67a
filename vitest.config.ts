/**
 * Vitest configuration
 *
 * Every test runs in process against the in-memory collaborators.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    testTimeout: 10000,
    sequence: {
      shuffle: false,
    },
  },
})
