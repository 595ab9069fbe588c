/**
 * Error codes surfaced by the plugin
 */
export const ErrorCodes = {
  INVALID_PATH: 'INVALID_PATH',
  NOT_FOUND: 'NOT_FOUND',
  IO_ERROR: 'IO_ERROR',
  CLIENT_UNAVAILABLE: 'CLIENT_UNAVAILABLE',
  STORE_WRITE: 'STORE_WRITE',
  SUBPROCESS_FAILED: 'SUBPROCESS_FAILED',
  MALFORMED_DOCUMENT: 'MALFORMED_DOCUMENT',
  INVALID_RECORD: 'INVALID_RECORD',
  LOOKUP_NOT_FOUND: 'LOOKUP_NOT_FOUND',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT'
} as const

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes]

/**
 * Base class for all plugin errors
 */
export class ChronicleError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'ChronicleError'
  }
}

/**
 * Error: manifest path escapes the working directory or is absolute
 */
export class InvalidPathError extends ChronicleError {
  constructor(
    public readonly path: string,
    reason: string
  ) {
    super(ErrorCodes.INVALID_PATH, `invalid filename: ${path} (${reason})`)
    this.name = 'InvalidPathError'
  }
}

/**
 * Error: manifest could not be read
 */
export class ManifestReadError extends ChronicleError {
  constructor(
    public readonly path: string,
    cause: unknown,
    code: ErrorCode = ErrorCodes.IO_ERROR
  ) {
    super(code, `failed to read file ${path}: ${describeError(cause)}`, {
      cause
    })
    this.name = 'ManifestReadError'
  }
}

/**
 * Error: manifest file does not exist
 */
export class ManifestNotFoundError extends ManifestReadError {
  constructor(path: string, cause: unknown) {
    super(path, cause, ErrorCodes.NOT_FOUND)
    this.name = 'ManifestNotFoundError'
  }
}

/**
 * Error: the cluster API client could not be constructed
 */
export class ClientUnavailableError extends ChronicleError {
  constructor(cause: unknown) {
    super(
      ErrorCodes.CLIENT_UNAVAILABLE,
      `could not create Kubernetes client: ${describeError(cause)}`,
      { cause }
    )
    this.name = 'ClientUnavailableError'
  }
}

/**
 * Error: a record create or update call failed
 */
export class StoreWriteError extends ChronicleError {
  constructor(
    public readonly recordName: string,
    cause: unknown
  ) {
    super(
      ErrorCodes.STORE_WRITE,
      `failed to write ${recordName}: ${describeError(cause)}`,
      { cause }
    )
    this.name = 'StoreWriteError'
  }
}

/**
 * Error: kubectl exited with a non-zero status or could not be started
 */
export class SubprocessFailedError extends ChronicleError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    cause?: unknown
  ) {
    super(
      ErrorCodes.SUBPROCESS_FAILED,
      cause === undefined
        ? `kubectl ${command} failed: exit status ${exitCode ?? 'unknown'}`
        : `kubectl ${command} failed: ${describeError(cause)}`,
      { cause }
    )
    this.name = 'SubprocessFailedError'
  }
}

/**
 * Error: a document given to the diff could not be parsed
 */
export class MalformedDocumentError extends ChronicleError {
  constructor(
    public readonly side: string,
    cause: unknown
  ) {
    super(
      ErrorCodes.MALFORMED_DOCUMENT,
      `failed to parse ${side} YAML: ${describeError(cause)}`,
      { cause }
    )
    this.name = 'MalformedDocumentError'
  }
}

/**
 * Error: the API server returned a record that fails validation
 */
export class InvalidRecordError extends ChronicleError {
  constructor(
    public readonly kind: string,
    cause: unknown
  ) {
    super(
      ErrorCodes.INVALID_RECORD,
      `invalid ${kind} record returned by the API server: ${describeError(cause)}`,
      { cause }
    )
    this.name = 'InvalidRecordError'
  }
}

/**
 * Error: a referenced History or Snapshot does not exist
 */
export class LookupNotFoundError extends ChronicleError {
  constructor(
    public readonly kind: string,
    public readonly recordName: string,
    public readonly namespace: string
  ) {
    super(
      ErrorCodes.LOOKUP_NOT_FOUND,
      `${kind} "${recordName}" not found in namespace "${namespace}"`
    )
    this.name = 'LookupNotFoundError'
  }
}

/**
 * Error: command line arguments are missing or invalid
 */
export class InvalidArgumentError extends ChronicleError {
  constructor(message: string) {
    super(ErrorCodes.INVALID_ARGUMENT, message)
    this.name = 'InvalidArgumentError'
  }
}

/**
 * Renders an unknown thrown value as a message string.
 */
export function describeError(error: unknown): string {
  if (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  ) {
    return error.message
  }
  return String(error)
}
