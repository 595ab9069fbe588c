import * as core from '@actions/core'
import { RECORDS, TIMELINE } from './constants.js'
import type { HistoryRecord, ResourceChange } from './types.js'

const COLUMN_WIDTHS: readonly number[] = [
  TIMELINE.COLUMN_WIDTHS.index,
  TIMELINE.COLUMN_WIDTHS.time,
  TIMELINE.COLUMN_WIDTHS.operation,
  TIMELINE.COLUMN_WIDTHS.created,
  TIMELINE.COLUMN_WIDTHS.modified,
  TIMELINE.COLUMN_WIDTHS.deleted,
  TIMELINE.COLUMN_WIDTHS.snapshot
]

export type OperationLabel = 'Apply' | 'Delete' | 'Patch'

/**
 * Resource lists shown in the created, modified and deleted columns
 */
export interface ChangeSummary {
  created: string
  modified: string
  deleted: string
}

/**
 * Reads one line of user input in answer to `question`
 */
export type Prompt = (question: string) => Promise<string>

/**
 * Renders recorded histories as a chronological table and lets the user
 * pick one to print in full.
 */
export class TimelineView {
  /**
   * Formats the histories as table lines, oldest first.
   */
  render(histories: readonly HistoryRecord[]): string[] {
    const lines = [
      formatRow(['#', 'Time', 'Operation', 'Created', 'Modified', 'Deleted', 'Snapshot ID']),
      '-'.repeat(TIMELINE.RULE_WIDTH)
    ]

    sortHistories(histories).forEach((history, index) => {
      const summary = summarizeChanges(history.spec.resourceChanges)
      lines.push(
        formatRow([
          String(index + 1),
          formatTime(recordedAt(history)),
          operationLabel(history.spec.snapshotRef),
          summary.created,
          summary.modified,
          summary.deleted,
          history.spec.snapshotRef
        ])
      )
    })

    return lines
  }

  /**
   * Prints the timeline, then asks once for a record to print in full when
   * a prompt is available. Anything but a listed number ends quietly.
   *
   * @returns The selected history, if any
   */
  async show(
    histories: readonly HistoryRecord[],
    ask?: Prompt
  ): Promise<HistoryRecord | undefined> {
    core.info('Timeline of Changes:')
    core.info('====================')
    for (const line of this.render(histories)) {
      core.info(line)
    }

    if (!ask || histories.length === 0) {
      return undefined
    }

    const sorted = sortHistories(histories)
    const answer = await ask(
      `\nEnter the number of the history to view YAML content (1-${sorted.length}, or 0 to exit): `
    )
    const choice = answer.trim()
    if (!/^\d+$/.test(choice)) {
      core.info('Invalid input, exiting')
      return undefined
    }

    const selected = sorted[Number(choice) - 1]
    if (!selected) {
      return undefined
    }

    core.info(`\nYAML Content for History ${selected.metadata.name}:`)
    core.info('=====================================')
    core.info(selected.spec.manifests)
    return selected
  }
}

/**
 * Sorts oldest first. Records with equal timestamps keep their listing
 * order.
 */
export function sortHistories(
  histories: readonly HistoryRecord[]
): HistoryRecord[] {
  return [...histories].sort(
    (a, b) => timestampOf(recordedAt(a)) - timestampOf(recordedAt(b))
  )
}

/**
 * Derives the operation from the snapshot reference naming convention.
 */
export function operationLabel(snapshotRef: string): OperationLabel {
  if (snapshotRef.startsWith(`${RECORDS.DELETE_REF_PREFIX}-`)) {
    return 'Delete'
  }
  if (snapshotRef.startsWith(`${RECORDS.PATCH_REF_PREFIX}-`)) {
    return 'Patch'
  }
  return 'Apply'
}

/**
 * Buckets resources by operation; unchanged resources are left out.
 */
export function summarizeChanges(
  changes: readonly ResourceChange[]
): ChangeSummary {
  const created: string[] = []
  const modified: string[] = []
  const deleted: string[] = []

  for (const change of changes) {
    switch (change.operation) {
      case 'Created':
        created.push(change.resource)
        break
      case 'Configured':
        modified.push(change.resource)
        break
      case 'Deleted':
        deleted.push(change.resource)
        break
    }
  }

  return {
    created: truncateCell(created.join(', ')),
    modified: truncateCell(modified.join(', ')),
    deleted: truncateCell(deleted.join(', '))
  }
}

export function truncateCell(value: string): string {
  if (value.length <= TIMELINE.MAX_CELL_LENGTH) {
    return value
  }
  return `${value.slice(0, TIMELINE.TRUNCATE_AT)}...`
}

/**
 * Formats an RFC 3339 timestamp as `YYYY-MM-DD HH:mm:ss` in UTC.
 */
export function formatTime(timestamp: string | undefined): string {
  const millis = timestampOf(timestamp)
  if (!timestamp || millis === 0) {
    return ''
  }
  return new Date(millis).toISOString().slice(0, 19).replace('T', ' ')
}

function recordedAt(history: HistoryRecord): string | undefined {
  return history.metadata.creationTimestamp ?? history.status.appliedAt
}

function timestampOf(timestamp: string | undefined): number {
  const millis = timestamp ? Date.parse(timestamp) : NaN
  return Number.isNaN(millis) ? 0 : millis
}

function formatRow(cells: readonly string[]): string {
  return cells
    .map((cell, index) => cell.padEnd(COLUMN_WIDTHS[index] ?? 0))
    .join(' ')
    .trimEnd()
}
