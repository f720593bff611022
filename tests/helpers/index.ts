/**
 * Test Helpers Module
 *
 * Re-exports all test helper utilities for easy import.
 */

export { cleanupTempDir, createIsolatedTempDir } from './temp-dir'
export { catchError, catchRejection } from './errors'
export { compileFixture, compileInline, fixturePath, inlineSources, openFixture } from './databases'
export type { InlineSources } from './databases'
