import { KUBERNETES } from './constants.js'
import type { Operation, OutputAnalysis, ResourceChange } from './types.js'

/**
 * Status words kubectl prints after a resource, mapped to the recorded
 * operation. `patched` is what `kubectl patch` reports for a real change.
 */
const OPERATION_WORDS: ReadonlyMap<string, Operation> = new Map<
  string,
  Operation
>([
  ['created', 'Created'],
  ['configured', 'Configured'],
  ['unchanged', 'Unchanged'],
  ['deleted', 'Deleted'],
  ['patched', 'Configured']
])

/**
 * Words searched for when a line has extra tokens, e.g.
 * `deployment.apps/web created (dry run)`
 */
const SCANNED_WORDS = new Set(['created', 'configured', 'unchanged', 'deleted'])

const QUOTED_NAME = /^"(.+)"$/
const NO_CHANGE_SUFFIX = /\(no change\)$/i

/**
 * Classifies one line of kubectl status output.
 *
 * Recognised shapes, in priority order:
 * 1. `<resource> <operation>`
 * 2. `<resource> "<name>" deleted`
 * 3. any line with a status word; the tokens before it form the resource
 *
 * @returns The change, or undefined when the line is blank or unrecognised
 */
export function parseStatusLine(line: string): ResourceChange | undefined {
  const trimmed = line.trim()
  if (trimmed === '') {
    return undefined
  }

  const parts = trimmed.split(/\s+/)
  if (parts.length < 2) {
    return undefined
  }

  // `kubectl patch` with an empty effect: "<resource> patched (no change)"
  if (parts[1].toLowerCase() === 'patched' && NO_CHANGE_SUFFIX.test(trimmed)) {
    return { resource: cleanResourceName(parts[0]), operation: 'Unchanged' }
  }

  if (parts.length === 2) {
    return toChange(parts[0], parts[1])
  }

  const quoted = QUOTED_NAME.exec(parts[1])
  if (parts.length === 3 && quoted && parts[2] === 'deleted') {
    return toChange(`${parts[0]}/${quoted[1]}`, parts[2])
  }

  const index = parts.findIndex((part) => SCANNED_WORDS.has(part.toLowerCase()))
  if (index > 0) {
    return toChange(parts.slice(0, index).join(' '), parts[index])
  }

  return undefined
}

/**
 * Parses kubectl's captured stdout into resource changes and an aggregate
 * change flag. Unchanged resources are listed but never set the flag.
 */
export function analyzeOutput(output: string): OutputAnalysis {
  const changes: ResourceChange[] = []

  for (const line of output.split(/\r?\n/)) {
    const change = parseStatusLine(line)
    if (change) {
      changes.push(change)
    }
  }

  return {
    hasChanges: changes.some((change) => change.operation !== 'Unchanged'),
    changes
  }
}

/**
 * Shortens a resource identifier by dropping a known API-group suffix from
 * its type, e.g. `deployment.apps/web` becomes `deployment/web`.
 */
export function cleanResourceName(resource: string): string {
  const slash = resource.indexOf('/')
  const type = slash === -1 ? resource : resource.slice(0, slash)
  const rest = slash === -1 ? '' : resource.slice(slash)

  const suffix = KUBERNETES.API_GROUP_SUFFIXES.find((candidate) =>
    type.endsWith(candidate)
  )
  if (!suffix || suffix.length === type.length) {
    return resource
  }
  return type.slice(0, -suffix.length) + rest
}

function toChange(
  resource: string,
  word: string
): ResourceChange | undefined {
  const operation = OPERATION_WORDS.get(word.toLowerCase())
  if (!operation) {
    return undefined
  }
  return { resource: cleanResourceName(resource), operation }
}
