import type { RecordStore } from '../src/record-store.js'
import type { HistoryRecord, SnapshotRecord } from '../src/types.js'

export type StoreMethod = keyof RecordStore

/**
 * In-process stand-in for the cluster-backed record store. Records are
 * copied on the way in and out, like a round trip through the API server.
 */
export class InMemoryRecordStore implements RecordStore {
  readonly snapshots = new Map<string, SnapshotRecord>()
  readonly histories = new Map<string, HistoryRecord>()
  readonly calls: StoreMethod[] = []

  /** Errors thrown by the next and every following call of a method */
  readonly failures: Partial<Record<StoreMethod, Error>> = {}

  async createSnapshot(snapshot: SnapshotRecord): Promise<void> {
    this.enter('createSnapshot')
    this.snapshots.set(keyOf(snapshot), structuredClone(snapshot))
  }

  async getSnapshot(
    name: string,
    namespace: string
  ): Promise<SnapshotRecord | undefined> {
    this.enter('getSnapshot')
    const snapshot = this.snapshots.get(`${namespace}/${name}`)
    return snapshot && structuredClone(snapshot)
  }

  async updateSnapshotStatus(snapshot: SnapshotRecord): Promise<void> {
    this.enter('updateSnapshotStatus')
    const stored = this.snapshots.get(keyOf(snapshot))
    if (!stored) {
      throw new Error(`snapshot ${snapshot.metadata.name} not found`)
    }
    stored.status = structuredClone(snapshot.status)
  }

  async deleteSnapshot(name: string, namespace: string): Promise<void> {
    this.enter('deleteSnapshot')
    this.snapshots.delete(`${namespace}/${name}`)
  }

  async createHistory(history: HistoryRecord): Promise<void> {
    this.enter('createHistory')
    this.histories.set(keyOf(history), structuredClone(history))
  }

  async getHistory(
    name: string,
    namespace: string
  ): Promise<HistoryRecord | undefined> {
    this.enter('getHistory')
    const history = this.histories.get(`${namespace}/${name}`)
    return history && structuredClone(history)
  }

  async listHistories(namespace: string): Promise<HistoryRecord[]> {
    this.enter('listHistories')
    return [...this.histories.values()]
      .filter((history) => history.metadata.namespace === namespace)
      .map((history) => structuredClone(history))
  }

  private enter(method: StoreMethod): void {
    this.calls.push(method)
    const failure = this.failures[method]
    if (failure) {
      throw failure
    }
  }
}

function keyOf(record: { metadata: { name: string; namespace?: string } }) {
  return `${record.metadata.namespace ?? ''}/${record.metadata.name}`
}
