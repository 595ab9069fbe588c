import * as k8s from '@kubernetes/client-node'
import * as core from '@actions/core'
import { z } from 'zod'
import { KUBERNETES, RECORDS } from './constants.js'
import {
  ClientUnavailableError,
  InvalidRecordError,
  describeError
} from './errors.js'
import type { RecordStore } from './record-store.js'
import {
  HistoryRecordSchema,
  SnapshotRecordSchema,
  type HistoryRecord,
  type SnapshotRecord
} from './types.js'

/**
 * The subset of `CustomObjectsApi` the store relies on
 */
export interface CustomObjectsClient {
  createNamespacedCustomObject(
    group: string,
    version: string,
    namespace: string,
    plural: string,
    body: object
  ): Promise<{ body: object }>
  getNamespacedCustomObject(
    group: string,
    version: string,
    namespace: string,
    plural: string,
    name: string
  ): Promise<{ body: object }>
  replaceNamespacedCustomObjectStatus(
    group: string,
    version: string,
    namespace: string,
    plural: string,
    name: string,
    body: object
  ): Promise<{ body: object }>
  deleteNamespacedCustomObject(
    group: string,
    version: string,
    namespace: string,
    plural: string,
    name: string
  ): Promise<{ body: object }>
  listNamespacedCustomObject(
    group: string,
    version: string,
    namespace: string,
    plural: string
  ): Promise<{ body: object }>
}

/**
 * Connection to the cluster that holds the records
 */
export interface ClusterConnection {
  store: RecordStore
  /** Namespace of the current kubeconfig context */
  namespace: string
}

const ListSchema = z.object({ items: z.array(z.unknown()).default([]) })

/**
 * Stores snapshots and histories as namespaced custom resources.
 */
export class KubernetesRecordStore implements RecordStore {
  constructor(private api: CustomObjectsClient) {}

  async createSnapshot(snapshot: SnapshotRecord): Promise<void> {
    const namespace = namespaceOf(snapshot)
    const { body } = await this.api.createNamespacedCustomObject(
      RECORDS.GROUP,
      RECORDS.VERSION,
      namespace,
      RECORDS.SNAPSHOT_PLURAL,
      {
        apiVersion: apiVersion(),
        kind: RECORDS.SNAPSHOT_KIND,
        metadata: snapshot.metadata,
        spec: snapshot.spec
      }
    )

    // Status is ignored on create, so the initial phase is a second write.
    // A snapshot without status already reads back as Pending.
    const created = parseRecord(SnapshotRecordSchema, body, 'snapshot')
    try {
      await this.updateSnapshotStatus({ ...created, status: snapshot.status })
    } catch (error) {
      core.warning(
        `Could not set status of snapshot ${created.metadata.name}: ${describeError(error)}`
      )
    }
  }

  async getSnapshot(
    name: string,
    namespace: string
  ): Promise<SnapshotRecord | undefined> {
    const body = await this.get(RECORDS.SNAPSHOT_PLURAL, name, namespace)
    return body && parseRecord(SnapshotRecordSchema, body, 'snapshot')
  }

  async updateSnapshotStatus(snapshot: SnapshotRecord): Promise<void> {
    await this.api.replaceNamespacedCustomObjectStatus(
      RECORDS.GROUP,
      RECORDS.VERSION,
      namespaceOf(snapshot),
      RECORDS.SNAPSHOT_PLURAL,
      snapshot.metadata.name,
      {
        apiVersion: apiVersion(),
        kind: RECORDS.SNAPSHOT_KIND,
        ...snapshot
      }
    )
  }

  async deleteSnapshot(name: string, namespace: string): Promise<void> {
    await this.api.deleteNamespacedCustomObject(
      RECORDS.GROUP,
      RECORDS.VERSION,
      namespace,
      RECORDS.SNAPSHOT_PLURAL,
      name
    )
  }

  async createHistory(history: HistoryRecord): Promise<void> {
    const namespace = namespaceOf(history)
    const { body } = await this.api.createNamespacedCustomObject(
      RECORDS.GROUP,
      RECORDS.VERSION,
      namespace,
      RECORDS.HISTORY_PLURAL,
      {
        apiVersion: apiVersion(),
        kind: RECORDS.HISTORY_KIND,
        metadata: history.metadata,
        spec: history.spec
      }
    )

    const created = parseRecord(HistoryRecordSchema, body, 'history')
    try {
      await this.api.replaceNamespacedCustomObjectStatus(
        RECORDS.GROUP,
        RECORDS.VERSION,
        namespace,
        RECORDS.HISTORY_PLURAL,
        created.metadata.name,
        { ...created, status: history.status }
      )
    } catch (error) {
      core.warning(
        `Could not set status of history ${created.metadata.name}: ${describeError(error)}`
      )
    }
  }

  async getHistory(
    name: string,
    namespace: string
  ): Promise<HistoryRecord | undefined> {
    const body = await this.get(RECORDS.HISTORY_PLURAL, name, namespace)
    return body && parseRecord(HistoryRecordSchema, body, 'history')
  }

  async listHistories(namespace: string): Promise<HistoryRecord[]> {
    const { body } = await this.api.listNamespacedCustomObject(
      RECORDS.GROUP,
      RECORDS.VERSION,
      namespace,
      RECORDS.HISTORY_PLURAL
    )

    const histories: HistoryRecord[] = []
    for (const item of parseRecord(ListSchema, body, 'history list').items) {
      const result = HistoryRecordSchema.safeParse(item)
      if (result.success) {
        histories.push(result.data)
      } else {
        core.warning(`Skipping malformed history record: ${result.error.message}`)
      }
    }
    return histories
  }

  private async get(
    plural: string,
    name: string,
    namespace: string
  ): Promise<object | undefined> {
    try {
      const { body } = await this.api.getNamespacedCustomObject(
        RECORDS.GROUP,
        RECORDS.VERSION,
        namespace,
        plural,
        name
      )
      return body
    } catch (error) {
      if (isNotFound(error)) {
        return undefined
      }
      throw error
    }
  }
}

/**
 * Builds a record store from the default kubeconfig (in-cluster config,
 * `$KUBECONFIG` or `~/.kube/config`).
 *
 * @param load - Fills the KubeConfig, `loadFromDefault` unless given
 * @throws ClientUnavailableError when no usable cluster is configured
 */
export function connectToCluster(
  load: (kubeConfig: k8s.KubeConfig) => void = (kubeConfig) =>
    kubeConfig.loadFromDefault()
): ClusterConnection {
  try {
    const kubeConfig = new k8s.KubeConfig()
    load(kubeConfig)

    const cluster = kubeConfig.getCurrentCluster()
    if (!cluster) {
      throw new Error('no current cluster in kubeconfig')
    }
    // Without any kubeconfig the library points at an unauthenticated local port
    if (
      kubeConfig.getCurrentContext() === KUBERNETES.FALLBACK_CONTEXT &&
      cluster.server === KUBERNETES.FALLBACK_SERVER
    ) {
      throw new Error('no kubeconfig found')
    }

    const context = kubeConfig.getContextObject(kubeConfig.getCurrentContext())
    return {
      store: new KubernetesRecordStore(
        kubeConfig.makeApiClient(k8s.CustomObjectsApi)
      ),
      namespace: context?.namespace || KUBERNETES.DEFAULT_NAMESPACE
    }
  } catch (error) {
    throw new ClientUnavailableError(error)
  }
}

function apiVersion(): string {
  return `${RECORDS.GROUP}/${RECORDS.VERSION}`
}

function namespaceOf(record: { metadata: { namespace?: string } }): string {
  return record.metadata.namespace || KUBERNETES.DEFAULT_NAMESPACE
}

function parseRecord<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown,
  label: string
): T {
  const result = schema.safeParse(body)
  if (!result.success) {
    throw new InvalidRecordError(label, result.error)
  }
  return result.data
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'statusCode' in error &&
    error.statusCode === 404
  )
}
