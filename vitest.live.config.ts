/**
 * Vitest configuration for functional suites against a deployed cloud.
 *
 * Credentials and endpoints come from CLOUDPROBE_* variables or the JSON
 * file named by CLOUDPROBE_CONFIG. See src/config/settings.ts.
 *
 * Run with:
 *   CLOUDPROBE_LIVE=true npm run test:live
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['test/functional/**/*.test.ts'],
    // Real API calls over the network
    testTimeout: 120_000,
    hookTimeout: 120_000,
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
    env: {
      CLOUDPROBE_LIVE: process.env.CLOUDPROBE_LIVE || 'true',
    },
    sequence: {
      shuffle: false,
    },
  },
})
