import * as core from '@actions/core'
import { KUBERNETES, MESSAGES, RECORDS } from './constants.js'
import { LookupNotFoundError, StoreWriteError, describeError } from './errors.js'
import { generateRecordName } from './id.js'
import type { RecordStore } from './record-store.js'
import type {
  HistoryRecord,
  ResourceChange,
  SnapshotPhase,
  SnapshotRecord
} from './types.js'

/**
 * Legal snapshot phase transitions. Completed and NoChanges are terminal.
 */
const TRANSITIONS: Readonly<Record<SnapshotPhase, readonly SnapshotPhase[]>> = {
  Pending: ['Completed', 'NoChanges'],
  Completed: [],
  NoChanges: []
}

export function canTransition(from: SnapshotPhase, to: SnapshotPhase): boolean {
  return TRANSITIONS[from].includes(to)
}

export interface RecordCoordinatorOptions {
  store: RecordStore
  /** Identity written to every record as the applier */
  appliedBy: string
  now?: () => Date
}

/**
 * Owns the snapshot → history lifecycle.
 *
 * A history is linked to its snapshot in two independent writes: the
 * history is created first, then the snapshot is marked Completed. When the
 * second write fails the snapshot stays Pending; nothing rolls the history
 * back.
 */
export class RecordCoordinator {
  private store: RecordStore
  private appliedBy: string
  private now: () => Date

  constructor(options: RecordCoordinatorOptions) {
    this.store = options.store
    this.appliedBy = options.appliedBy
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Persists a Pending snapshot of the manifest about to be applied.
   *
   * @param namespace - The namespace flag as given; may be empty
   * @returns The snapshot name
   * @throws StoreWriteError when the snapshot cannot be created
   */
  async createSnapshot(manifest: string, namespace: string): Promise<string> {
    const now = this.now()
    const name = generateRecordName(RECORDS.SNAPSHOT_PREFIX, now)

    const snapshot: SnapshotRecord = {
      metadata: { name, namespace: targetNamespace(namespace) },
      spec: {
        manifests: manifest,
        description: `Applied by ${this.appliedBy} at ${formatTimestamp(now)}`,
        targetNamespace: namespace
      },
      status: { phase: 'Pending' }
    }

    try {
      await this.store.createSnapshot(snapshot)
    } catch (error) {
      throw new StoreWriteError(`snapshot ${name}`, error)
    }
    return name
  }

  /**
   * Persists a history record, then marks the referenced snapshot
   * Completed. A missing snapshot is expected for delete and patch, whose
   * references are synthetic.
   *
   * @returns The history name
   * @throws StoreWriteError when the history cannot be created
   */
  async createHistory(
    manifest: string,
    snapshotRef: string,
    namespace: string,
    changes: readonly ResourceChange[]
  ): Promise<string> {
    const now = this.now()
    const name = generateRecordName(RECORDS.HISTORY_PREFIX, now)
    const appliedAt = formatTimestamp(now)
    const recordNamespace = targetNamespace(namespace)

    const history: HistoryRecord = {
      metadata: { name, namespace: recordNamespace },
      spec: {
        manifests: manifest,
        snapshotRef,
        description: `Applied by ${this.appliedBy}`,
        appliedBy: this.appliedBy,
        resourceChanges: [...changes],
        resourceTypes: resourceTypesOf(changes)
      },
      status: {
        appliedAt,
        summary: MESSAGES.HISTORY_SUMMARY
      }
    }

    try {
      await this.store.createHistory(history)
    } catch (error) {
      throw new StoreWriteError(`history ${name}`, error)
    }

    await this.linkSnapshot(snapshotRef, recordNamespace, name, appliedAt)
    return name
  }

  /**
   * Marks an unused snapshot NoChanges and deletes it. Failures are logged
   * as warnings and a missing snapshot is a no-op.
   */
  async cleanupSnapshot(name: string, namespace: string): Promise<void> {
    const recordNamespace = targetNamespace(namespace)

    let snapshot: SnapshotRecord | undefined
    try {
      snapshot = await this.store.getSnapshot(name, recordNamespace)
    } catch (error) {
      core.warning(`Could not read snapshot ${name}: ${describeError(error)}`)
      return
    }
    if (!snapshot) {
      return
    }
    if (!canTransition(snapshot.status.phase, 'NoChanges')) {
      core.warning(
        `Snapshot ${name} is already ${snapshot.status.phase}, leaving it in place`
      )
      return
    }

    try {
      await this.store.updateSnapshotStatus({
        ...snapshot,
        status: {
          ...snapshot.status,
          phase: 'NoChanges',
          message: MESSAGES.SNAPSHOT_NO_CHANGES
        }
      })
    } catch (error) {
      core.warning(`Could not update snapshot status: ${describeError(error)}`)
    }

    try {
      await this.store.deleteSnapshot(name, recordNamespace)
      core.info(`Cleaned up unused snapshot: ${name}`)
    } catch (error) {
      core.warning(
        `Could not delete unused snapshot ${name}: ${describeError(error)}`
      )
    }
  }

  /**
   * @throws LookupNotFoundError when the history does not exist
   */
  async getHistory(name: string, namespace: string): Promise<HistoryRecord> {
    const recordNamespace = targetNamespace(namespace)
    const history = await this.store.getHistory(name, recordNamespace)
    if (!history) {
      throw new LookupNotFoundError('history', name, recordNamespace)
    }
    return history
  }

  /**
   * @throws LookupNotFoundError when the snapshot does not exist
   */
  async getSnapshot(name: string, namespace: string): Promise<SnapshotRecord> {
    const recordNamespace = targetNamespace(namespace)
    const snapshot = await this.store.getSnapshot(name, recordNamespace)
    if (!snapshot) {
      throw new LookupNotFoundError('snapshot', name, recordNamespace)
    }
    return snapshot
  }

  async listHistories(namespace: string): Promise<HistoryRecord[]> {
    return this.store.listHistories(targetNamespace(namespace))
  }

  private async linkSnapshot(
    snapshotRef: string,
    namespace: string,
    historyName: string,
    appliedAt: string
  ): Promise<void> {
    let snapshot: SnapshotRecord | undefined
    try {
      snapshot = await this.store.getSnapshot(snapshotRef, namespace)
    } catch (error) {
      core.warning(
        `Could not read snapshot ${snapshotRef}, it stays Pending: ${describeError(error)}`
      )
      return
    }

    if (!snapshot) {
      core.info(`History ${historyName} recorded without snapshot update`)
      return
    }
    if (!canTransition(snapshot.status.phase, 'Completed')) {
      core.warning(
        `Snapshot ${snapshotRef} is already ${snapshot.status.phase}, not linking it to ${historyName}`
      )
      return
    }

    try {
      await this.store.updateSnapshotStatus({
        ...snapshot,
        status: {
          ...snapshot.status,
          phase: 'Completed',
          appliedAt,
          historyRef: historyName,
          message: MESSAGES.SNAPSHOT_COMPLETED
        }
      })
    } catch (error) {
      core.warning(
        `Could not link snapshot ${snapshotRef} to history ${historyName}, it stays Pending: ${describeError(error)}`
      )
    }
  }
}

/**
 * Namespace records are written to: the flag, or `default`.
 */
export function targetNamespace(namespace: string | undefined): string {
  return namespace || KUBERNETES.DEFAULT_NAMESPACE
}

/**
 * RFC 3339 timestamp with second precision, as the API server writes them.
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z')
}

function resourceTypesOf(changes: readonly ResourceChange[]): string[] {
  const types = new Set<string>()
  for (const change of changes) {
    if (change.operation !== 'Unchanged') {
      types.add(change.resource.split('/')[0])
    }
  }
  return [...types]
}
