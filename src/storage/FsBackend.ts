/**
 * FsBackend - Node.js filesystem implementation of StorageBackend
 *
 * Uses node:fs/promises for file operations with support for:
 * - Atomic writes (write to a temp file then rename)
 * - Byte range reads (for Parquet partial file access)
 * - Path traversal prevention
 */

import { promises as fs } from 'node:fs'
import type { Dirent, Stats } from 'node:fs'
import { randomUUID } from 'node:crypto'
import { join, dirname, normalize, resolve, relative, sep } from 'node:path'
import { logger } from '../utils/logger'
import type {
  StorageBackend,
  FileStat,
  ListOptions,
  ListResult,
  WriteOptions,
  WriteResult,
} from '../types/storage'
import { FileNotFoundError, PathTraversalError } from '../errors'
import { contentTypeForPath, normalizePath, parseCursor, validateRange } from './utils'

function isNotFound(error: unknown): boolean {
  return !!error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT'
}

/**
 * Node.js filesystem storage backend
 */
export class FsBackend implements StorageBackend {
  readonly type = 'fs'
  private readonly resolvedRootPath: string

  /**
   * @param rootPath - The root directory for all operations
   */
  constructor(public readonly rootPath: string) {
    this.resolvedRootPath = resolve(rootPath)
  }

  /**
   * Resolve and validate a path, preventing path traversal
   */
  private resolvePath(path: string): string {
    if (path.includes('\x00')) {
      throw new PathTraversalError(path)
    }

    if (path.split(/[\\/]/).includes('..')) {
      throw new PathTraversalError(path)
    }

    let decoded = path
    try {
      decoded = decodeURIComponent(path)
    } catch {
      // Not percent-encoded: the raw path was already checked above
      decoded = path
    }
    if (decoded.split(/[\\/]/).includes('..')) {
      throw new PathTraversalError(path)
    }

    const fullPath = resolve(this.resolvedRootPath, normalize(normalizePath(path)))

    if (!fullPath.startsWith(this.resolvedRootPath + sep) && fullPath !== this.resolvedRootPath) {
      throw new PathTraversalError(path)
    }

    return fullPath
  }

  /**
   * Generate an ETag from file stats
   */
  private generateEtag(stat: Stats): string {
    return `"${stat.mtimeMs.toString(36)}-${stat.size.toString(36)}"`
  }

  async read(path: string): Promise<Uint8Array> {
    const fullPath = this.resolvePath(path)
    try {
      return new Uint8Array(await fs.readFile(fullPath))
    } catch (error: unknown) {
      if (isNotFound(error)) {
        throw new FileNotFoundError(path)
      }
      throw error
    }
  }

  async readRange(path: string, start: number, end: number): Promise<Uint8Array> {
    validateRange(start, end)

    const fullPath = this.resolvePath(path)

    let handle: import('node:fs/promises').FileHandle | undefined
    try {
      handle = await fs.open(fullPath, 'r')
      const fileStat = await handle.stat()

      const length = Math.min(end, fileStat.size) - start
      if (length <= 0) {
        return new Uint8Array(0)
      }

      const buffer = Buffer.alloc(length)
      await handle.read(buffer, 0, length, start)
      return new Uint8Array(buffer)
    } catch (error: unknown) {
      if (isNotFound(error)) {
        throw new FileNotFoundError(path)
      }
      throw error
    } finally {
      if (handle) {
        await handle.close()
      }
    }
  }

  async exists(path: string): Promise<boolean> {
    const fullPath = this.resolvePath(path)
    try {
      await fs.access(fullPath)
      return true
    } catch {
      // fs.access throws when the file does not exist
      return false
    }
  }

  async stat(path: string): Promise<FileStat | null> {
    const fullPath = this.resolvePath(path)
    try {
      const stat = await fs.stat(fullPath)
      return {
        path,
        size: stat.size,
        mtime: stat.mtime,
        isDirectory: stat.isDirectory(),
        etag: this.generateEtag(stat),
        contentType: stat.isDirectory() ? undefined : contentTypeForPath(path),
      }
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return null
      }
      throw error
    }
  }

  async list(prefix: string, options: ListOptions = {}): Promise<ListResult> {
    const normalizedPrefix = normalizePath(prefix)
    const files = (await this.walk(this.resolvedRootPath))
      .filter(file => file.startsWith(normalizedPrefix))
      .sort()

    const startIndex = parseCursor(options.cursor)
    const endIndex =
      options.limit !== undefined ? Math.min(startIndex + options.limit, files.length) : files.length
    const hasMore = endIndex < files.length

    const result: ListResult = {
      files: files.slice(startIndex, endIndex),
      hasMore,
    }
    if (hasMore) {
      result.cursor = endIndex.toString()
    }
    return result
  }

  /**
   * Collect every file under a directory as root-relative posix paths
   */
  private async walk(dirPath: string): Promise<string[]> {
    let entries: Dirent[]
    try {
      entries = await fs.readdir(dirPath, { withFileTypes: true })
    } catch (error: unknown) {
      logger.debug(`Failed to read directory ${dirPath} during list`, error)
      return []
    }

    const files: string[] = []
    for (const entry of entries) {
      const entryPath = join(dirPath, entry.name)
      if (entry.isDirectory()) {
        files.push(...(await this.walk(entryPath)))
      } else if (!entry.name.includes('.tmp-')) {
        files.push(relative(this.resolvedRootPath, entryPath).split(sep).join('/'))
      }
    }
    return files
  }

  /**
   * Write file atomically (temp file then rename), creating parent directories
   *
   * The content type is not stored; `stat` derives it from the extension.
   */
  async write(path: string, data: Uint8Array, _options?: WriteOptions): Promise<WriteResult> {
    const fullPath = this.resolvePath(path)
    const tempPath = `${fullPath}.tmp-${randomUUID()}`

    await fs.mkdir(dirname(fullPath), { recursive: true })

    try {
      await fs.writeFile(tempPath, data)
      await fs.rename(tempPath, fullPath)
    } catch (error: unknown) {
      await fs.rm(tempPath, { force: true })
      throw error
    }

    const stat = await fs.stat(fullPath)
    return {
      etag: this.generateEtag(stat),
      size: data.length,
    }
  }

  async delete(path: string): Promise<boolean> {
    const fullPath = this.resolvePath(path)
    try {
      const stat = await fs.stat(fullPath)
      if (stat.isDirectory()) {
        return false
      }
      await fs.unlink(fullPath)
      return true
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return false
      }
      throw error
    }
  }

  async deletePrefix(prefix: string): Promise<number> {
    const { files } = await this.list(prefix)
    for (const file of files) {
      await fs.unlink(this.resolvePath(file))
    }
    return files.length
  }
}
