import * as fs from 'fs'
import * as path from 'path'
import { KUBERNETES } from './constants.js'
import {
  InvalidPathError,
  ManifestNotFoundError,
  ManifestReadError
} from './errors.js'

/**
 * Reads manifest files and concatenates them into one multi-document blob.
 */
export class ManifestLoader {
  private baseDir: string

  /**
   * @param baseDir - Directory relative paths are resolved against
   */
  constructor(baseDir: string = process.cwd()) {
    this.baseDir = baseDir
  }

  /**
   * Loads every file in order and joins the non-empty contents with a
   * document separator. Fails on the first invalid or unreadable path.
   */
  async load(filenames: readonly string[]): Promise<string> {
    // Validate everything up front so a bad path never follows a read
    const cleanPaths = filenames.map((filename) => validatePath(filename))

    const contents: string[] = []
    for (const [index, cleanPath] of cleanPaths.entries()) {
      const filename = filenames[index]
      let content: string
      try {
        content = await fs.promises.readFile(
          path.join(this.baseDir, cleanPath),
          'utf8'
        )
      } catch (error) {
        if (isNotFound(error)) {
          throw new ManifestNotFoundError(filename, error)
        }
        throw new ManifestReadError(filename, error)
      }

      if (content.length > 0) {
        contents.push(content)
      }
    }

    return contents.join(KUBERNETES.DOCUMENT_JOINER)
  }
}

/**
 * Returns the normalized form of a relative manifest path, rejecting
 * absolute paths and any path that still walks up after normalization.
 */
export function validatePath(filename: string): string {
  if (path.isAbsolute(filename)) {
    throw new InvalidPathError(filename, 'absolute paths not allowed')
  }

  const cleanPath = path.normalize(filename)
  if (cleanPath.split(/[\\/]/).includes('..')) {
    throw new InvalidPathError(filename, "contains '..'")
  }

  return cleanPath
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  )
}
