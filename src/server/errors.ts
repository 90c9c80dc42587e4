/**
 * HTTP mapping of pipeline errors
 */

import { ErrorCode, isRowAssetsError } from '../errors'

export type ErrorStatus = 400 | 404 | 422 | 500

const STATUS_BY_CODE: Partial<Record<ErrorCode, ErrorStatus>> = {
  [ErrorCode.INVALID_INPUT]: 400,
  [ErrorCode.PATH_TRAVERSAL]: 400,
  [ErrorCode.FILE_NOT_FOUND]: 404,
  [ErrorCode.TYPE_MISMATCH]: 422,
  [ErrorCode.ARITY_MISMATCH]: 422,
  [ErrorCode.UNKNOWN_FEATURE_TYPE]: 422,
  [ErrorCode.MISSING_EXTENSION]: 422,
  [ErrorCode.ENCODING_EXHAUSTED]: 422,
}

/**
 * HTTP status for an error thrown while serving rows
 */
export function statusForError(error: unknown): ErrorStatus {
  if (isRowAssetsError(error)) {
    return STATUS_BY_CODE[error.code] ?? 500
  }
  return 500
}

/**
 * JSON body for an error response
 */
export function errorBody(error: unknown): { error: string; code: ErrorCode } {
  if (isRowAssetsError(error)) {
    return { error: error.message, code: error.code }
  }
  return {
    error: error instanceof Error ? error.message : 'Internal error',
    code: ErrorCode.INTERNAL,
  }
}
