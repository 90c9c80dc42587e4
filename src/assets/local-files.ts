/**
 * Access to media files referenced by local path in dataset cells
 */

import { promises as fs } from 'node:fs'
import { FileNotFoundError } from '../errors'

function isNotFound(error: unknown): boolean {
  return !!error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT'
}

/**
 * Whether a regular file exists at a local path
 */
export async function localFileExists(path: string): Promise<boolean> {
  try {
    return (await fs.stat(path)).isFile()
  } catch (error: unknown) {
    if (isNotFound(error)) {
      return false
    }
    throw error
  }
}

/**
 * Read a local file
 *
 * @throws FileNotFoundError if there is no file at that path
 */
export async function readLocalFile(path: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await fs.readFile(path))
  } catch (error: unknown) {
    if (isNotFound(error)) {
      throw new FileNotFoundError(path, error instanceof Error ? error : undefined)
    }
    throw error
  }
}
