/**
 * Test setup for the pipeline package
 * Keeps test output quiet and leaves every suite with fresh mocks.
 */

import { afterEach, vi } from 'vitest'

// The logger reads LOG_LEVEL at construction; the vitest env block sets it,
// this covers runs that bypass the config file.
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'error'

afterEach(() => {
  vi.clearAllMocks()
  vi.useRealTimers()
})
