/**
 * Vitest Configuration for the Pipeline Package
 *
 * Unit tests live beside the code under __tests__/. Nothing here reaches a
 * database, the network or an external binary: the store, the discovery
 * engine and the speech engine are replaced by in-process doubles.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Test environment - Node.js for server-side testing
    environment: 'node',

    // Test file patterns
    include: [
      'config/**/*.test.ts',
      'lib/**/*.test.ts',
      'services/**/*.test.ts',
      'jobs/**/*.test.ts'
    ],

    exclude: [
      '**/node_modules/**',
      '**/dist/**'
    ],

    setupFiles: ['./tests/setupTests.ts'],

    // Test timeouts
    testTimeout: 10000,
    hookTimeout: 10000,

    // Test isolation
    isolate: true,
    watch: false,

    // Environment variables for testing
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'error' // Suppress logs during testing
    }
  }
})
