import * as yaml from 'js-yaml'
import { diffChars } from 'diff'
import { KUBERNETES } from './constants.js'
import { MalformedDocumentError } from './errors.js'
import type { ManifestDiff } from './types.js'

export type DocumentSide = 'before' | 'after'

export interface RenderOptions {
  /** Colour insertions green and deletions red instead of using markers */
  color?: boolean
}

const ANSI = {
  GREEN: '\u001b[32m',
  RED: '\u001b[31m',
  RESET: '\u001b[0m'
} as const

/**
 * Compares two recorded manifests after stripping the fields the API server
 * manages, and renders the result as an inline annotated diff.
 */
export class ManifestComparator {
  compare(before: string, after: string): ManifestDiff {
    const beforeClean = this.normalize(before, 'before')
    const afterClean = this.normalize(after, 'after')

    const changes = diffChars(beforeClean, afterClean)

    return {
      before: beforeClean,
      after: afterClean,
      changes,
      hasDifferences: changes.some((change) => change.added || change.removed)
    }
  }

  /**
   * Parses every document in `text`, removes volatile fields and dumps the
   * result with sorted keys.
   *
   * @param side - Which input is being parsed, used in error messages
   */
  normalize(text: string, side: DocumentSide): string {
    let documents: unknown[]
    try {
      documents = yaml.loadAll(text)
    } catch (error) {
      throw new MalformedDocumentError(side, error)
    }

    const cleaned: string[] = []
    for (const document of documents) {
      if (document === null || document === undefined) {
        continue
      }
      if (!isMapping(document)) {
        throw new MalformedDocumentError(
          side,
          new Error('document is not a mapping')
        )
      }

      removeVolatileFields(document)
      cleaned.push(yaml.dump(document, { sortKeys: true }))
    }

    return cleaned.join('---\n')
  }

  /**
   * Renders a diff inline. Unchanged spans are kept verbatim, deletions are
   * wrapped in `[-...-]` and insertions in `{+...+}`.
   *
   * @returns An empty string when there is nothing to show
   */
  render(diff: ManifestDiff, options: RenderOptions = {}): string {
    if (!diff.hasDifferences) {
      return ''
    }

    return diff.changes
      .map((change) => {
        if (change.added) {
          return options.color
            ? `${ANSI.GREEN}${change.value}${ANSI.RESET}`
            : `{+${change.value}+}`
        }
        if (change.removed) {
          return options.color
            ? `${ANSI.RED}${change.value}${ANSI.RESET}`
            : `[-${change.value}-]`
        }
        return change.value
      })
      .join('')
  }
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  )
}

function removeVolatileFields(object: Record<string, unknown>): void {
  delete object.status

  const metadata = object.metadata
  if (isMapping(metadata)) {
    for (const field of KUBERNETES.VOLATILE_METADATA_FIELDS) {
      delete metadata[field]
    }
  }
}
