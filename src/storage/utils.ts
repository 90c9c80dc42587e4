/**
 * Shared utility functions for storage backends
 */

import {
  AUDIO_MIME_TYPES,
  IMAGE_FORMAT_EXTENSIONS,
  IMAGE_FORMAT_MIME_TYPES,
  PDF_MIME_TYPE,
  VIDEO_MIME_TYPES,
  type ImageFormat,
} from '../constants'

const IMAGE_FORMATS: readonly ImageFormat[] = ['JPEG', 'PNG', 'WEBP']

const MIME_TYPES_BY_EXTENSION: Readonly<Record<string, string>> = {
  ...Object.fromEntries(
    IMAGE_FORMATS.map(format => [IMAGE_FORMAT_EXTENSIONS[format], IMAGE_FORMAT_MIME_TYPES[format]])
  ),
  '.jpeg': IMAGE_FORMAT_MIME_TYPES.JPEG,
  ...AUDIO_MIME_TYPES,
  ...VIDEO_MIME_TYPES,
  '.pdf': PDF_MIME_TYPE,
}

/**
 * MIME type of a stored file from its extension
 *
 * @returns undefined for unknown extensions
 */
export function contentTypeForPath(path: string): string | undefined {
  const dot = path.lastIndexOf('.')
  if (dot === -1 || dot < path.lastIndexOf('/')) {
    return undefined
  }
  return MIME_TYPES_BY_EXTENSION[path.slice(dot).toLowerCase()]
}

/**
 * Generate a deterministic ETag from data content
 *
 * Same content always produces the same ETag, so rewriting an asset with
 * identical bytes leaves its version unchanged.
 *
 * @param data - The data to generate an ETag for
 * @returns An ETag string based on content hash and size
 *
 * @example
 * ```typescript
 * generateEtag(new Uint8Array([1, 2, 3])) === generateEtag(new Uint8Array([1, 2, 3])) // true
 * ```
 */
export function generateEtag(data: Uint8Array): string {
  // FNV-1a
  let hash = 2166136261
  for (const byte of data) {
    hash ^= byte
    hash = Math.imul(hash, 16777619) >>> 0
  }
  return `${hash.toString(16)}-${data.length.toString(36)}`
}

/**
 * Normalize a storage path by removing leading slashes
 *
 * @example
 * ```typescript
 * normalizePath('/foo/bar')  // 'foo/bar'
 * normalizePath('foo/bar')   // 'foo/bar'
 * normalizePath('/')         // ''
 * ```
 */
export function normalizePath(path: string): string {
  return path.replace(/^\/+/, '')
}

/**
 * Parse a pagination cursor, falling back to the first page
 */
export function parseCursor(cursor: string | undefined): number {
  if (!cursor) return 0
  const index = parseInt(cursor, 10)
  return isNaN(index) || index < 0 ? 0 : index
}

/**
 * Validate range parameters for readRange operations
 *
 * @throws RangeError if start is negative or end is before start
 */
export function validateRange(start: number, end: number): void {
  if (start < 0) {
    throw new RangeError(`Invalid range: start (${start}) must be non-negative`)
  }
  if (end < start) {
    throw new RangeError(`Invalid range: end (${end}) must be >= start (${start})`)
  }
}
