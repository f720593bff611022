/**
 * Test Temp Directory Utilities
 *
 * Each test gets its own temp directory; cleanup retries while the
 * filesystem still reports the directory busy.
 *
 * Usage:
 * ```typescript
 * let tempDir: string
 *
 * beforeEach(async () => {
 *   tempDir = await createIsolatedTempDir()
 * })
 *
 * afterEach(async () => {
 *   await cleanupTempDir(tempDir)
 * })
 * ```
 */

import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

function errorCode(error: unknown): unknown {
  return error !== null && typeof error === 'object' && 'code' in error ? error.code : undefined
}

/**
 * Create a unique temp directory
 */
export async function createIsolatedTempDir(prefix = 'sqlweave-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix))
}

/**
 * Remove a temp directory, retrying on ENOTEMPTY and EBUSY
 */
export async function cleanupTempDir(tempDir: string, maxRetries = 5, retryDelay = 50): Promise<void> {
  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      await rm(tempDir, { recursive: true, force: true, maxRetries: 3 })
      return
    } catch (error: unknown) {
      const code = errorCode(error)
      if (code === 'ENOENT') return
      const retriable = code === 'ENOTEMPTY' || code === 'EBUSY'
      if (!retriable || attempt === maxRetries - 1) throw error
      await new Promise((resolve) => setTimeout(resolve, retryDelay * (attempt + 1)))
    }
  }
}
