/**
 * Vitest configuration for unit and functional tests.
 *
 * Functional suites under test/functional start their own in-process
 * emulators, so nothing here reaches the network.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    testTimeout: 15_000,
    hookTimeout: 15_000,
    env: {
      CLOUDPROBE_LIVE: 'false',
    },
  },
})
