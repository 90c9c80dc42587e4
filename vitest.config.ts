/**
 * Vitest Configuration
 *
 * Runs the unit tests under Node.js. Codec tests load sharp's native
 * binding, so files run in forks with isolated module state.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,

    pool: 'forks',
    poolOptions: {
      forks: {
        isolate: true,
      },
    },
    fileParallelism: true,
    sequence: {
      shuffle: false,
    },

    include: ['tests/**/*.test.ts'],

    setupFiles: ['tests/setup.ts'],

    testTimeout: 30000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/**/index.ts'],
      thresholds: {
        lines: 80,
        branches: 70,
        functions: 80,
        statements: 80,
      },
    },
  },
})
