/**
 * Storage backend interface
 * Abstracts the filesystem and in-memory stores assets are written to
 */

// =============================================================================
// Core Storage Interface
// =============================================================================

/**
 * Read-only storage backend interface
 *
 * Enough for readers such as the Parquet row source.
 */
export interface ReadonlyStorageBackend {
  /** Backend type identifier */
  readonly type: string

  /**
   * Read entire file
   */
  read(path: string): Promise<Uint8Array>

  /**
   * Read byte range from file (for Parquet partial reads)
   *
   * Uses EXCLUSIVE end position semantics (like Array.slice):
   * - readRange(path, 0, 5) reads bytes 0,1,2,3,4 (5 bytes)
   * - readRange(path, 5, 5) returns empty array (zero-length range)
   *
   * If end exceeds file size, returns bytes up to end of file.
   * If start >= file size, returns empty array.
   */
  readRange(path: string, start: number, end: number): Promise<Uint8Array>

  /**
   * Check if file exists
   */
  exists(path: string): Promise<boolean>

  /**
   * Get file metadata
   */
  stat(path: string): Promise<FileStat | null>

  /**
   * List files with prefix
   */
  list(prefix: string, options?: ListOptions): Promise<ListResult>
}

/**
 * Storage backend interface
 * Implementations: FsBackend, MemoryBackend
 */
export interface StorageBackend extends ReadonlyStorageBackend {
  /**
   * Write file (overwrite if exists)
   */
  write(path: string, data: Uint8Array, options?: WriteOptions): Promise<WriteResult>

  /**
   * Delete file
   */
  delete(path: string): Promise<boolean>

  /**
   * Delete files with prefix
   */
  deletePrefix(prefix: string): Promise<number>
}

// =============================================================================
// File Metadata
// =============================================================================

/** File statistics */
export interface FileStat {
  /** File path */
  path: string

  /** File size in bytes */
  size: number

  /** Last modified time */
  mtime: Date

  /** Is directory */
  isDirectory: boolean

  /** ETag/version */
  etag?: string | undefined

  /** Content type (MIME) */
  contentType?: string | undefined
}

// =============================================================================
// List Operations
// =============================================================================

/** Options for list operation */
export interface ListOptions {
  /** Maximum results to return */
  limit?: number | undefined

  /** Cursor for pagination */
  cursor?: string | undefined
}

/** Result of list operation */
export interface ListResult {
  /** File paths (or keys) */
  files: string[]

  /** Cursor for next page */
  cursor?: string | undefined

  /** Whether there are more results */
  hasMore: boolean
}

// =============================================================================
// Write Operations
// =============================================================================

/** Options for write operation */
export interface WriteOptions {
  /**
   * Content type (MIME)
   *
   * Backends that keep no metadata beside the bytes (FsBackend) report the
   * type matching the file extension instead.
   */
  contentType?: string | undefined
}

/** Result of write operation */
export interface WriteResult {
  /** ETag/version of written file */
  etag: string

  /** Bytes written */
  size: number
}
