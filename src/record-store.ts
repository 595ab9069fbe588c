import type { HistoryRecord, SnapshotRecord } from './types.js'

/**
 * Persistence port for snapshot and history records. Lookups resolve to
 * `undefined` when the record does not exist and reject on any other
 * failure.
 */
export interface RecordStore {
  createSnapshot(snapshot: SnapshotRecord): Promise<void>
  getSnapshot(name: string, namespace: string): Promise<SnapshotRecord | undefined>
  /** Writes `snapshot.status` through the status subresource */
  updateSnapshotStatus(snapshot: SnapshotRecord): Promise<void>
  deleteSnapshot(name: string, namespace: string): Promise<void>

  createHistory(history: HistoryRecord): Promise<void>
  getHistory(name: string, namespace: string): Promise<HistoryRecord | undefined>
  listHistories(namespace: string): Promise<HistoryRecord[]>
}
