/**
 * Record name generation
 */

import { randomBytes } from 'node:crypto'

/**
 * Generates a record name of the form `<prefix>-<unix-seconds>-<hex>`.
 *
 * The timestamp keeps names roughly sortable; the random suffix keeps two
 * invocations within the same second apart. The result is a valid DNS
 * subdomain as long as the prefix is.
 *
 * @example
 * generateRecordName('chronicle-history') // "chronicle-history-1760870400-3f9a1c"
 */
export function generateRecordName(
  prefix: string,
  now: Date = new Date()
): string {
  const seconds = Math.floor(now.getTime() / 1000)
  const suffix = randomBytes(3).toString('hex')
  return `${prefix}-${seconds}-${suffix}`
}
