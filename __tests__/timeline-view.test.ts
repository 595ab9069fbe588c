/**
 * Unit tests for the timeline table, src/timeline-view.ts
 */
import { jest } from '@jest/globals'
import * as core from '@actions/core'
import {
  TimelineView,
  formatTime,
  operationLabel,
  sortHistories,
  summarizeChanges,
  truncateCell
} from '../src/timeline-view.js'
import type { HistoryRecord } from '../src/types.js'

jest.mock('@actions/core')

const HEADER =
  '#   Time                 Operation       Created                             Modified                            Deleted                             Snapshot ID'

const DELETE_HISTORY: HistoryRecord = {
  metadata: {
    name: 'chronicle-history-2-aaaaaa',
    namespace: 'default',
    creationTimestamp: '2026-10-19T09:00:00Z'
  },
  spec: {
    manifests: 'kind: ConfigMap\nmetadata:\n  name: old\n',
    snapshotRef: 'delete-1-abc',
    resourceChanges: [{ resource: 'configmap/old', operation: 'Deleted' }]
  },
  status: {}
}

const APPLY_HISTORY: HistoryRecord = {
  metadata: {
    name: 'chronicle-history-1-bbbbbb',
    namespace: 'default',
    creationTimestamp: '2026-10-19T08:00:00Z'
  },
  spec: {
    manifests: 'kind: Deployment\nmetadata:\n  name: demo\n',
    snapshotRef: 'chronicle-snapshot-1-bbbbbb',
    resourceChanges: [
      { resource: 'deployment/demo', operation: 'Created' },
      { resource: 'service/demo', operation: 'Configured' },
      { resource: 'configmap/settings', operation: 'Unchanged' }
    ]
  },
  status: {}
}

describe('timeline-view.ts', () => {
  const view = new TimelineView()

  describe('render', () => {
    it('should list histories oldest first under a header', () => {
      expect(view.render([DELETE_HISTORY, APPLY_HISTORY])).toEqual([
        HEADER,
        '-'.repeat(173),
        '1   2026-10-19 08:00:00  Apply           deployment/demo                     service/demo                                                            chronicle-snapshot-1-bbbbbb',
        '2   2026-10-19 09:00:00  Delete                                                                                  configmap/old                       delete-1-abc'
      ])
    })

    it('should render only the header for an empty namespace', () => {
      expect(view.render([])).toEqual([HEADER, '-'.repeat(173)])
    })
  })

  describe('show', () => {
    it('should print the selected history in full', async () => {
      const ask = jest.fn(async (_question: string) => ' 2\n')

      const selected = await view.show([DELETE_HISTORY, APPLY_HISTORY], ask)

      expect(selected).toBe(DELETE_HISTORY)
      expect(ask).toHaveBeenCalledWith(
        '\nEnter the number of the history to view YAML content (1-2, or 0 to exit): '
      )
      expect(core.info).toHaveBeenCalledWith('Timeline of Changes:')
      expect(core.info).toHaveBeenCalledWith(
        '\nYAML Content for History chronicle-history-2-aaaaaa:'
      )
      expect(core.info).toHaveBeenLastCalledWith(DELETE_HISTORY.spec.manifests)
    })

    it('should exit quietly on zero or an out of range number', async () => {
      for (const answer of ['0', '3']) {
        const selected = await view.show([APPLY_HISTORY], async () => answer)

        expect(selected).toBeUndefined()
      }
      expect(core.info).not.toHaveBeenCalledWith(
        expect.stringContaining('YAML Content')
      )
      expect(core.info).not.toHaveBeenCalledWith('Invalid input, exiting')
    })

    it('should exit on input that is not a number', async () => {
      await expect(
        view.show([APPLY_HISTORY], async () => 'first')
      ).resolves.toBeUndefined()
      expect(core.info).toHaveBeenCalledWith('Invalid input, exiting')
    })

    it('should not prompt without records or without a prompt', async () => {
      const ask = jest.fn(async (_question: string) => '1')

      await view.show([], ask)
      await view.show([APPLY_HISTORY])

      expect(ask).not.toHaveBeenCalled()
    })
  })

  it('should sort by creation time, falling back to appliedAt', () => {
    const late: HistoryRecord = {
      ...APPLY_HISTORY,
      metadata: { name: 'late' },
      status: { appliedAt: '2026-10-19T10:00:00Z' }
    }
    const undated: HistoryRecord = { ...APPLY_HISTORY, metadata: { name: 'undated' } }

    expect(
      sortHistories([late, DELETE_HISTORY, undated, APPLY_HISTORY]).map(
        (history) => history.metadata.name
      )
    ).toEqual([
      'undated',
      'chronicle-history-1-bbbbbb',
      'chronicle-history-2-aaaaaa',
      'late'
    ])
  })

  it('should keep listing order for equal timestamps', () => {
    const at = (name: string): HistoryRecord => ({
      ...APPLY_HISTORY,
      metadata: { name, creationTimestamp: '2026-10-19T08:00:00Z' }
    })

    expect(
      sortHistories([at('b'), at('a'), at('c')]).map(
        (history) => history.metadata.name
      )
    ).toEqual(['b', 'a', 'c'])
  })

  it('should derive the operation from the snapshot reference', () => {
    expect(operationLabel('delete-1792398600-abcdef')).toBe('Delete')
    expect(operationLabel('patch-1792398600-abcdef')).toBe('Patch')
    expect(operationLabel('chronicle-snapshot-1792398600-abcdef')).toBe('Apply')
    expect(operationLabel('deleted-thing')).toBe('Apply')
    expect(operationLabel('')).toBe('Apply')
  })

  it('should bucket changes and drop unchanged resources', () => {
    expect(summarizeChanges(APPLY_HISTORY.spec.resourceChanges)).toEqual({
      created: 'deployment/demo',
      modified: 'service/demo',
      deleted: ''
    })
  })

  it('should truncate long cells', () => {
    expect(truncateCell('a'.repeat(33))).toBe('a'.repeat(33))
    expect(truncateCell('a'.repeat(34))).toBe(`${'a'.repeat(30)}...`)
    expect(
      summarizeChanges([
        { resource: 'deployment/frontend', operation: 'Created' },
        { resource: 'deployment/backend', operation: 'Created' }
      ]).created
    ).toBe('deployment/frontend, deploymen...')
  })

  it('should format times in UTC', () => {
    expect(formatTime('2026-10-19T08:30:05+02:00')).toBe('2026-10-19 06:30:05')
    expect(formatTime(undefined)).toBe('')
    expect(formatTime('not a time')).toBe('')
  })
})
