/**
 * In-memory snapshot store
 *
 * Keeps one snapshot per database name. Bytes are copied on the way in and
 * on the way out, so callers never share buffers with the store.
 *
 * @module persistence/memory-store
 */

import type { SnapshotStore } from './types'

export class MemorySnapshotStore implements SnapshotStore {
  private readonly snapshots = new Map<string, Uint8Array>()

  async load(dbName: string): Promise<Uint8Array | null> {
    const snapshot = this.snapshots.get(dbName)
    return snapshot ? new Uint8Array(snapshot) : null
  }

  async persist(dbName: string, snapshot: Uint8Array): Promise<void> {
    this.snapshots.set(dbName, new Uint8Array(snapshot))
  }

  has(dbName: string): boolean {
    return this.snapshots.has(dbName)
  }

  delete(dbName: string): boolean {
    return this.snapshots.delete(dbName)
  }
}
