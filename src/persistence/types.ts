/**
 * Snapshot persistence types
 *
 * @module persistence/types
 */

import type { MutationEvent } from '../transaction/coordinator'

/**
 * Durable home of database snapshots, one per database name. The most
 * recent snapshot wins.
 */
export interface SnapshotStore {
  /** Latest snapshot, or null when none was persisted */
  load(dbName: string): Promise<Uint8Array | null>
  persist(dbName: string, snapshot: Uint8Array): Promise<void>
}

export interface PersistenceController {
  /** Whether snapshots are written at all */
  readonly enabled: boolean
  /** Drop the cached snapshot after a write */
  invalidate(): void
  /** React to a completed operation or commit with a best-effort flush */
  handleMutation(event: MutationEvent): Promise<void>
  /**
   * Persist the current database image
   *
   * @throws PersistenceError when the store fails
   */
  flush(): Promise<void>
  /** Final forced flush */
  close(): Promise<void>
}
