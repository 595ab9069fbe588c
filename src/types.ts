import { z } from 'zod'
import type { Change } from 'diff'

/**
 * Operation reported by kubectl for a single resource
 */
export const OperationSchema = z.enum([
  'Created',
  'Configured',
  'Deleted',
  'Unchanged'
])
export type Operation = z.infer<typeof OperationSchema>

/**
 * One resource's classified operation within a single invocation
 */
export const ResourceChangeSchema = z.object({
  /** Resource identifier with API-group suffixes removed, e.g. `deployment/web` */
  resource: z.string(),
  operation: OperationSchema
})
export type ResourceChange = z.infer<typeof ResourceChangeSchema>

/**
 * Snapshot lifecycle state
 */
export const SnapshotPhaseSchema = z.enum(['Pending', 'Completed', 'NoChanges'])
export type SnapshotPhase = z.infer<typeof SnapshotPhaseSchema>

/**
 * Standard object metadata. Unknown fields (uid, resourceVersion, ...) are
 * kept so a record can be written back unchanged.
 */
const ObjectMetaSchema = z
  .object({
    name: z.string(),
    namespace: z.string().optional(),
    creationTimestamp: z.string().optional()
  })
  .passthrough()

export const SnapshotRecordSchema = z.object({
  apiVersion: z.string().optional(),
  kind: z.string().optional(),
  metadata: ObjectMetaSchema,
  spec: z.object({
    manifests: z.string(),
    description: z.string().optional(),
    targetNamespace: z.string().optional()
  }),
  status: z
    .object({
      // The status subresource is empty until the first status write
      phase: SnapshotPhaseSchema.default('Pending'),
      message: z.string().optional(),
      appliedAt: z.string().optional(),
      historyRef: z.string().optional()
    })
    .default({})
})

/**
 * Before-state captured immediately before kubectl runs
 */
export type SnapshotRecord = z.infer<typeof SnapshotRecordSchema>

export const HistoryRecordSchema = z.object({
  apiVersion: z.string().optional(),
  kind: z.string().optional(),
  metadata: ObjectMetaSchema,
  spec: z.object({
    manifests: z.string(),
    snapshotRef: z.string().default(''),
    description: z.string().optional(),
    appliedBy: z.string().optional(),
    resourceChanges: z.array(ResourceChangeSchema).default([]),
    resourceTypes: z.array(z.string()).optional()
  }),
  status: z
    .object({
      appliedAt: z.string().optional(),
      summary: z.string().optional()
    })
    .default({})
})

/**
 * Immutable record of a successful, change-producing invocation
 */
export type HistoryRecord = z.infer<typeof HistoryRecordSchema>

/**
 * Result of classifying kubectl's status output
 */
export interface OutputAnalysis {
  /** True when at least one resource was created, configured or deleted */
  hasChanges: boolean
  /** Every recognised status line, in output order */
  changes: ResourceChange[]
}

/**
 * Resource identity extracted from a manifest document
 */
export interface ResourceIdentity {
  kind: string
  name: string
  namespace: string
}

/**
 * Represents the difference between two normalized manifests
 */
export interface ManifestDiff {
  /** Canonical text of the before side */
  before: string
  /** Canonical text of the after side */
  after: string
  /** Character-level change spans */
  changes: Change[]
  /** False when both sides normalize to the same text */
  hasDifferences: boolean
}
