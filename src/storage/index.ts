/**
 * Storage Module
 *
 * Storage backends the asset layer writes through and row sources read from.
 *
 * Implementations:
 * - MemoryBackend: In-memory storage for testing
 * - FsBackend: Node.js filesystem
 */

export type {
  ReadonlyStorageBackend,
  StorageBackend,
  FileStat,
  ListOptions,
  ListResult,
  WriteOptions,
  WriteResult,
} from '../types/storage'

export { MemoryBackend } from './MemoryBackend'
export { FsBackend } from './FsBackend'
export { contentTypeForPath, generateEtag, normalizePath, parseCursor, validateRange } from './utils'
