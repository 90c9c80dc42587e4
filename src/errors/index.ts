/**
 * Row Assets Error Handling Module
 *
 * Standardized error hierarchy for the row transformation pipeline.
 * All errors extend from RowAssetsError which provides:
 * - Error codes for programmatic handling
 * - Serialization for API responses
 * - Cause chaining for debugging
 *
 * Error Hierarchy:
 * - RowAssetsError (base class)
 *   - TypeMismatchError (cell shape does not match its feature type)
 *   - ArityMismatchError (fixed-length list of the wrong length)
 *   - UnknownFeatureTypeError (schema node outside the known variants)
 *   - EncodingExhaustedError (every output format failed)
 *   - MissingExtensionError (media extension cannot be derived)
 *   - StorageError (storage backend failures)
 *     - FileNotFoundError
 *     - PathTraversalError
 *   - TranscodeError (external transcoder failures)
 *   - ConfigurationError (invalid configuration)
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for row transformation.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',
  INVALID_INPUT = 'INVALID_INPUT',

  // Cell/schema errors
  TYPE_MISMATCH = 'TYPE_MISMATCH',
  ARITY_MISMATCH = 'ARITY_MISMATCH',
  UNKNOWN_FEATURE_TYPE = 'UNKNOWN_FEATURE_TYPE',

  // Media errors
  ENCODING_EXHAUSTED = 'ENCODING_EXHAUSTED',
  UNSUPPORTED_IMAGE_MODE = 'UNSUPPORTED_IMAGE_MODE',
  MISSING_EXTENSION = 'MISSING_EXTENSION',
  TRANSCODE_FAILED = 'TRANSCODE_FAILED',

  // Storage errors
  STORAGE_ERROR = 'STORAGE_ERROR',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  PATH_TRAVERSAL = 'PATH_TRAVERSAL',

  // Configuration errors
  INVALID_CONFIG = 'INVALID_CONFIG',
}

// =============================================================================
// Serialized Error Format
// =============================================================================

/**
 * Serializable error format for API responses
 */
export interface SerializedError {
  /** Error class name */
  name: string
  /** Error code for programmatic handling */
  code: ErrorCode
  /** Human-readable error message */
  message: string
  /** Stack trace (included outside production) */
  stack?: string | undefined
  /** Additional context data */
  context?: Record<string, unknown> | undefined
  /** Serialized cause (if error chaining) */
  cause?: SerializedError | undefined
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all row-assets errors.
 *
 * @example
 * ```typescript
 * throw new RowAssetsError('Operation failed', ErrorCode.INTERNAL, {
 *   column: 'image',
 *   rowIdx: 3,
 * })
 * ```
 */
export class RowAssetsError extends Error {
  override readonly name: string = 'RowAssetsError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error | undefined

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Serialize error for API responses
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stack: process.env.NODE_ENV !== 'production' ? this.stack : undefined,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof RowAssetsError ? this.cause.toJSON() : undefined,
    }
  }

  /**
   * Create error from serialized format
   */
  static fromJSON(data: SerializedError): RowAssetsError {
    const cause = data.cause ? RowAssetsError.fromJSON(data.cause) : undefined
    const error = new RowAssetsError(data.message, data.code, data.context, cause)
    if (data.stack) {
      error.stack = data.stack
    }
    return error
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }
}

/** Where in a row a cell error happened */
export interface CellErrorContext {
  column?: string | undefined
  rowIdx?: number | undefined
  path?: ReadonlyArray<string | number> | undefined
}

// =============================================================================
// Cell and Schema Errors
// =============================================================================

/**
 * Error thrown when a cell's shape does not match what its feature type expects
 * (e.g. a non-array cell under a list feature).
 */
export class TypeMismatchError extends RowAssetsError {
  override readonly name = 'TypeMismatchError'

  constructor(message: string, context?: CellErrorContext & { expected?: string | undefined }) {
    super(message, ErrorCode.TYPE_MISMATCH, { ...context })
    Object.setPrototypeOf(this, TypeMismatchError.prototype)
  }
}

/**
 * Error thrown when a fixed-length list cell has the wrong number of elements.
 */
export class ArityMismatchError extends RowAssetsError {
  override readonly name = 'ArityMismatchError'
  readonly expectedLength: number
  readonly actualLength: number

  constructor(expectedLength: number, actualLength: number, context?: CellErrorContext) {
    super(
      `List cell length should be ${expectedLength} as declared by its feature, got ${actualLength}`,
      ErrorCode.ARITY_MISMATCH,
      { ...context, expectedLength, actualLength }
    )
    this.expectedLength = expectedLength
    this.actualLength = actualLength
    Object.setPrototypeOf(this, ArityMismatchError.prototype)
  }
}

/**
 * Error thrown when a schema node is not one of the known feature types.
 */
export class UnknownFeatureTypeError extends RowAssetsError {
  override readonly name = 'UnknownFeatureTypeError'

  constructor(featureType: string, context?: CellErrorContext) {
    super(
      `Could not determine the type of the data cell: unknown feature type "${featureType}"`,
      ErrorCode.UNKNOWN_FEATURE_TYPE,
      { ...context, featureType }
    )
    Object.setPrototypeOf(this, UnknownFeatureTypeError.prototype)
  }

  get featureType(): string {
    return String(this.context.featureType)
  }
}

// =============================================================================
// Media Errors
// =============================================================================

/**
 * Error thrown when an asset could not be written in any of the attempted formats.
 */
export class EncodingExhaustedError extends RowAssetsError {
  override readonly name = 'EncodingExhaustedError'
  readonly formats: readonly string[]

  constructor(kind: string, formats: readonly string[], context?: CellErrorContext, cause?: Error) {
    super(
      `${kind} cannot be written as ${formats.join(' or ')}`,
      ErrorCode.ENCODING_EXHAUSTED,
      { ...context, kind, formats: [...formats] },
      cause
    )
    this.formats = formats
    Object.setPrototypeOf(this, EncodingExhaustedError.prototype)
  }
}

/**
 * Error thrown when the file extension of a media cell cannot be derived.
 */
export class MissingExtensionError extends RowAssetsError {
  override readonly name = 'MissingExtensionError'

  constructor(kind: string, sourcePath: string | null, context?: CellErrorContext) {
    super(
      sourcePath === null
        ? `A ${kind} sample should have a 'path' with a file name and extension, but got no path`
        : `A ${kind} sample should have a 'path' with a file name and extension, but got "${sourcePath}"`,
      ErrorCode.MISSING_EXTENSION,
      { ...context, kind, sourcePath }
    )
    Object.setPrototypeOf(this, MissingExtensionError.prototype)
  }
}

/**
 * Error thrown when an external transcoder fails.
 */
export class TranscodeError extends RowAssetsError {
  override readonly name = 'TranscodeError'

  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCode.TRANSCODE_FAILED, context, cause)
    Object.setPrototypeOf(this, TranscodeError.prototype)
  }
}

// =============================================================================
// Storage Errors
// =============================================================================

/**
 * Base error class for storage failures.
 */
export class StorageError extends RowAssetsError {
  override readonly name: string = 'StorageError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.STORAGE_ERROR,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, StorageError.prototype)
  }

  /** Path associated with this error */
  get path(): string | undefined {
    const path = this.context.path
    return typeof path === 'string' ? path : undefined
  }
}

/**
 * Error thrown when a file is not found in storage.
 */
export class FileNotFoundError extends StorageError {
  override readonly name = 'FileNotFoundError'

  constructor(path: string, cause?: Error) {
    super(`File not found: ${path}`, ErrorCode.FILE_NOT_FOUND, { path }, cause)
    Object.setPrototypeOf(this, FileNotFoundError.prototype)
  }
}

/**
 * Error thrown when a path would escape the storage root.
 */
export class PathTraversalError extends StorageError {
  override readonly name = 'PathTraversalError'

  constructor(path: string) {
    super(`Path traversal attempt detected: ${path}`, ErrorCode.PATH_TRAVERSAL, { path })
    Object.setPrototypeOf(this, PathTraversalError.prototype)
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when configuration is invalid.
 */
export class ConfigurationError extends RowAssetsError {
  override readonly name = 'ConfigurationError'

  constructor(message: string, variable?: string, cause?: Error) {
    super(message, ErrorCode.INVALID_CONFIG, variable ? { variable } : undefined, cause)
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if error is a RowAssetsError
 */
export function isRowAssetsError(error: unknown): error is RowAssetsError {
  return error instanceof RowAssetsError
}

/**
 * Check if error is a StorageError
 */
export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError
}

/**
 * Wrap any thrown value in a RowAssetsError, keeping existing ones as-is
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): RowAssetsError {
  if (isRowAssetsError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new RowAssetsError(error.message, ErrorCode.INTERNAL, context, error)
  }
  return new RowAssetsError(String(error), ErrorCode.UNKNOWN, context)
}
