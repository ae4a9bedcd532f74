/**
 * Global Vitest setup file
 *
 * Runs before every suite:
 * - forces UTC so indexedAt/downloadedAt comparisons are stable
 * - keeps human console output and file logging out of test runs
 */

import { afterEach, beforeEach, vi } from 'vitest'

import { setHumanLoggingEnabled } from '#utils/human'
import { clearSinks } from '#utils/logger'

process.env.TZ = 'UTC'
process.env.LOG_TO_FILE = 'false'

// Several suites attach SIGINT handlers through ProgressManager.
process.setMaxListeners(64)

beforeEach(() => {
	vi.useRealTimers()
	setHumanLoggingEnabled(false)
})

afterEach(() => {
	vi.restoreAllMocks()
	clearSinks()
	setHumanLoggingEnabled(true)
})

export {}
