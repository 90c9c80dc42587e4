/**
 * Asset Routes
 *
 * Serves the files written by a StorageClient under its base URL path.
 *
 * @module
 */

import { Hono } from 'hono'
import type { StorageClient } from '../assets/storage-client'
import { DEFAULT_MIME_TYPE } from '../constants'
import { ErrorCode } from '../errors'
import { logger } from '../utils/logger'
import { errorBody, statusForError } from './errors'

/**
 * Create the asset routes
 *
 * @param client - Client whose assets are served
 * @param basePath - Path the routes are mounted under, e.g. '/assets'
 */
export function createAssetRoutes(client: StorageClient, basePath = '/assets') {
  const app = new Hono()
  const root = basePath.replace(/\/+$/, '')

  app.get(`${root}/*`, async (c) => {
    let key: string
    try {
      key = client.keyFromUrlPath(c.req.path.slice(root.length))
    } catch {
      // decodeURIComponent rejects malformed escapes
      return c.json({ error: 'Malformed asset path', code: ErrorCode.INVALID_INPUT }, 400)
    }

    try {
      const stat = await client.backend.stat(key)
      if (!stat || stat.isDirectory) {
        return c.json({ error: 'Asset not found', code: ErrorCode.FILE_NOT_FOUND }, 404)
      }
      const data = await client.backend.read(key)
      const body = new ArrayBuffer(data.byteLength)
      new Uint8Array(body).set(data)
      return c.body(body, 200, {
        'Content-Type': stat.contentType ?? DEFAULT_MIME_TYPE,
        'Content-Length': String(data.byteLength),
      })
    } catch (error) {
      logger.error('[AssetAPI] Error reading asset:', error)
      return c.json(errorBody(error), statusForError(error))
    }
  })

  return app
}
