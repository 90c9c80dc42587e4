/**
 * MemoryBackend - In-memory implementation of StorageBackend
 *
 * Used for testing and for short-lived asset stores that never touch disk.
 */

import type {
  StorageBackend,
  FileStat,
  ListOptions,
  ListResult,
  WriteOptions,
  WriteResult,
} from '../types/storage'
import { FileNotFoundError } from '../errors'
import { generateEtag, normalizePath, parseCursor, validateRange } from './utils'

/** Stored file entry */
interface FileEntry {
  data: Uint8Array
  metadata: FileStat
}

/**
 * In-memory storage backend
 */
export class MemoryBackend implements StorageBackend {
  readonly type = 'memory'

  /** In-memory storage for files */
  private files = new Map<string, FileEntry>()

  /**
   * Read entire file
   */
  async read(path: string): Promise<Uint8Array> {
    path = normalizePath(path)
    const entry = this.files.get(path)
    if (!entry) {
      throw new FileNotFoundError(path)
    }
    // Return a copy to prevent external mutation
    return new Uint8Array(entry.data)
  }

  /**
   * Read byte range from file
   */
  async readRange(path: string, start: number, end: number): Promise<Uint8Array> {
    validateRange(start, end)

    path = normalizePath(path)
    const entry = this.files.get(path)
    if (!entry) {
      throw new FileNotFoundError(path)
    }

    if (start >= entry.data.length) {
      return new Uint8Array(0)
    }

    return entry.data.slice(start, Math.min(end, entry.data.length))
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(normalizePath(path))
  }

  async stat(path: string): Promise<FileStat | null> {
    path = normalizePath(path)

    const entry = this.files.get(path)
    if (entry) {
      return { ...entry.metadata }
    }

    // Any file under this path makes it an implicit directory
    const dirPath = path.endsWith('/') ? path : path + '/'
    for (const filePath of this.files.keys()) {
      if (filePath.startsWith(dirPath)) {
        return {
          path,
          size: 0,
          mtime: new Date(),
          isDirectory: true,
        }
      }
    }

    return null
  }

  /**
   * List files with prefix
   *
   * A prefix not ending with '/' must match a complete path segment:
   * 'dat' does not match 'data/file.txt'.
   */
  async list(prefix: string, options: ListOptions = {}): Promise<ListResult> {
    prefix = normalizePath(prefix)

    const matchingFiles: string[] = []
    for (const filePath of this.files.keys()) {
      if (!filePath.startsWith(prefix)) {
        continue
      }
      if (prefix.length > 0 && !prefix.endsWith('/')) {
        const charAfterPrefix = filePath[prefix.length]
        if (charAfterPrefix !== undefined && charAfterPrefix !== '/') {
          continue
        }
      }
      matchingFiles.push(filePath)
    }

    matchingFiles.sort()

    const startIndex = parseCursor(options.cursor)
    const endIndex =
      options.limit !== undefined
        ? Math.min(startIndex + options.limit, matchingFiles.length)
        : matchingFiles.length
    const hasMore = endIndex < matchingFiles.length

    const result: ListResult = {
      files: matchingFiles.slice(startIndex, endIndex),
      hasMore,
    }
    if (hasMore) {
      result.cursor = endIndex.toString()
    }
    return result
  }

  /**
   * Write file (overwrite if exists)
   */
  async write(path: string, data: Uint8Array, options: WriteOptions = {}): Promise<WriteResult> {
    path = normalizePath(path)

    const etag = generateEtag(data)
    this.files.set(path, {
      data: new Uint8Array(data),
      metadata: {
        path,
        size: data.length,
        mtime: new Date(),
        isDirectory: false,
        etag,
        contentType: options.contentType,
      },
    })

    return { etag, size: data.length }
  }

  async delete(path: string): Promise<boolean> {
    return this.files.delete(normalizePath(path))
  }

  async deletePrefix(prefix: string): Promise<number> {
    prefix = normalizePath(prefix)
    let count = 0
    for (const path of [...this.files.keys()]) {
      if (path.startsWith(prefix)) {
        this.files.delete(path)
        count++
      }
    }
    return count
  }

  /**
   * Remove every file (test helper)
   */
  clear(): void {
    this.files.clear()
  }

  /** Number of stored files */
  get size(): number {
    return this.files.size
  }
}
