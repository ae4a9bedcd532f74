/**
 * Test Helper Utilities
 *
 * Centralized stand-ins for the thumbnail repository tests:
 * - in-process HTTP client and canned image host / watch page responses
 * - temp repositories on disk, seeded through the entry builder
 * - scripted selector, editor and confirmer
 * - CLI services for running commands in process
 */

export * from './mock-http'
export * from './mock-services'
export * from './mock-terminal'
export * from './temp-repository'
export * from './test-data-builders'
