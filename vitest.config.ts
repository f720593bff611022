/**
 * Vitest configuration for sqlweave
 *
 * Runs every unit test under tests/. Tests open in-memory SQLite databases
 * through better-sqlite3, so each fork keeps its own native module state.
 */

import { defineConfig } from 'vitest/config'
import os from 'node:os'

// Use half of the cores, between 2 and 8 forks
const cpuCount = os.cpus().length
const optimalForks = Math.max(2, Math.min(Math.floor(cpuCount / 2), 8))

export default defineConfig({
  test: {
    globals: true,

    pool: 'forks',
    poolOptions: {
      forks: {
        maxForks: optimalForks,
        minForks: 1,
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
      reporter: ['text', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: ['src/**/index.ts'],
    },
  },
})
