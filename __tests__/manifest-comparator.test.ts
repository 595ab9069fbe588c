/**
 * Unit tests for manifest normalization and diffing,
 * src/manifest-comparator.ts
 */
import { ErrorCodes, MalformedDocumentError } from '../src/errors.js'
import { ManifestComparator } from '../src/manifest-comparator.js'

const BEFORE = `apiVersion: v1
kind: ConfigMap
metadata:
  name: test
  namespace: default
  creationTimestamp: "2026-10-19T08:00:00Z"
  resourceVersion: "1001"
  uid: 5f0c2a52-0000-4000-8000-000000000001
data:
  key: old-value
`

const AFTER = `apiVersion: v1
kind: ConfigMap
metadata:
  name: test
  namespace: default
  creationTimestamp: "2026-10-19T08:00:00Z"
  resourceVersion: "1002"
  uid: 5f0c2a52-0000-4000-8000-000000000001
data:
  key: new-value
`

describe('manifest-comparator.ts', () => {
  const comparator = new ManifestComparator()

  it('should highlight exactly the changed value', () => {
    const diff = comparator.compare(BEFORE, AFTER)

    expect(diff.hasDifferences).toBe(true)
    expect(diff.before).toBe(
      'apiVersion: v1\ndata:\n  key: old-value\nkind: ConfigMap\nmetadata:\n  name: test\n  namespace: default\n'
    )
    expect(diff.after).toBe(diff.before.replace('old-value', 'new-value'))

    const removed = diff.changes.filter((change) => change.removed)
    const added = diff.changes.filter((change) => change.added)
    expect(removed.map((change) => change.value).join('')).toBe('old')
    expect(added.map((change) => change.value).join('')).toBe('new')
  })

  it('should render deletions and insertions inline', () => {
    const rendered = comparator.render(comparator.compare(BEFORE, AFTER))

    const afterOnly = rendered
      .replace(/\[-[^\]]*-\]/g, '')
      .replace(/\{\+|\+\}/g, '')
    const beforeOnly = rendered
      .replace(/\{\+[^}]*\+\}/g, '')
      .replace(/\[-|-\]/g, '')

    expect(afterOnly).toContain('key: new-value')
    expect(beforeOnly).toContain('key: old-value')
    expect(rendered).toContain('[-')
    expect(rendered).toContain('{+')
  })

  it('should render a substitution as removal then insertion', () => {
    const diff = comparator.compare('a: 1\n', 'a: 2\n')

    expect(comparator.render(diff)).toBe('a: [-1-]{+2+}\n')
    expect(comparator.render(diff, { color: true })).toBe(
      'a: \u001b[31m1\u001b[0m\u001b[32m2\u001b[0m\n'
    )
  })

  it('should find no differences between identical documents', () => {
    const diff = comparator.compare(BEFORE, BEFORE)

    expect(diff.hasDifferences).toBe(false)
    expect(comparator.render(diff)).toBe('')
  })

  it('should ignore fields managed by the API server', () => {
    const live = `apiVersion: v1
kind: ConfigMap
metadata:
  name: test
  namespace: default
  generation: 4
  annotations:
    kubectl.kubernetes.io/last-applied-configuration: "{}"
  managedFields:
    - manager: kubectl
data:
  key: old-value
status:
  observed: true
`
    const plain = `kind: ConfigMap
apiVersion: v1
data:
  key: old-value
metadata:
  namespace: default
  name: test
`

    expect(comparator.compare(live, plain).hasDifferences).toBe(false)
  })

  it('should normalize every document of a multi-document manifest', () => {
    expect(comparator.normalize('b: 1\na: 2\n---\n---\nc: 3\n', 'before')).toBe(
      'a: 2\nb: 1\n---\nc: 3\n'
    )
  })

  it('should reject documents that do not parse', () => {
    const error = (() => {
      try {
        return comparator.compare('key: [unclosed', AFTER)
      } catch (e) {
        return e
      }
    })()

    expect(error).toBeInstanceOf(MalformedDocumentError)
    expect(error).toMatchObject({
      code: ErrorCodes.MALFORMED_DOCUMENT,
      side: 'before'
    })
    expect(String(error)).toContain('failed to parse before YAML: ')
  })

  it('should reject documents that are not mappings', () => {
    expect(() => comparator.compare(BEFORE, '- a\n- b\n')).toThrow(
      'failed to parse after YAML: document is not a mapping'
    )
  })
})
