/**
 * Snapshot persistence
 *
 * @module persistence
 */

export type { PersistenceController, SnapshotStore } from './types'
export { MemorySnapshotStore } from './memory-store'
export { FsSnapshotStore, type FsSnapshotStoreOptions } from './fs-store'
export {
  NoopPersistenceController,
  SnapshotPersistenceController,
  type SnapshotPersistenceOptions,
} from './controller'
