/**
 * StorageClient - asset keys and public URLs over a StorageBackend
 *
 * Asset keys follow the layout
 * `{prefix}/{dataset}/--/{revision}/--/{config}/{split}/{rowIdx}/{column}/{filename}`
 * so that every asset of a dataset revision can be listed or removed by prefix.
 *
 * @module assets/storage-client
 */

import { DATASET_SEPARATOR } from '../constants'
import type { StorageBackend } from '../types/storage'
import type { AssetLocation } from '../types/row'
import { logger } from '../utils/logger'

/** One asset file, located inside a dataset split */
export interface AssetTarget {
  location: AssetLocation
  rowIdx: number
  column: string
  filename: string
}

export interface StorageClientOptions {
  /** Public URL the asset keys are served under */
  baseUrl: string
  /** Key prefix inside the backend */
  prefix?: string | undefined
}

export class StorageClient {
  private readonly baseUrl: string
  private readonly prefix: string

  constructor(
    readonly backend: StorageBackend,
    options: StorageClientOptions
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.prefix = (options.prefix ?? '').replace(/^\/+|\/+$/g, '')
  }

  /**
   * Key segments of a dataset revision, prefix excluded
   */
  private datasetSegments(location: Pick<AssetLocation, 'dataset' | 'revision'>): string[] {
    return [location.dataset, DATASET_SEPARATOR, location.revision, DATASET_SEPARATOR]
  }

  private targetSegments(target: AssetTarget): string[] {
    const { location } = target
    return [
      ...this.datasetSegments(location),
      location.config,
      location.split,
      String(target.rowIdx),
      target.column,
      target.filename,
    ]
  }

  private toKey(segments: readonly string[]): string {
    return (this.prefix ? [this.prefix, ...segments] : segments).join('/')
  }

  /**
   * Backend key of an asset
   *
   * @example
   * ```typescript
   * client.getKey({ location, rowIdx: 0, column: 'image', filename: 'image.jpg' })
   * // 'user/ds/--/main/--/default/train/0/image/image.jpg'
   * ```
   */
  getKey(target: AssetTarget): string {
    return this.toKey(this.targetSegments(target))
  }

  /**
   * Public URL of an asset, each key segment percent-encoded
   */
  getUrl(target: AssetTarget): string {
    return [this.baseUrl, ...this.targetSegments(target).map(encodeURIComponent)].join('/')
  }

  /**
   * Backend key of a URL path relative to the base URL (the inverse of `getUrl`)
   *
   * @throws URIError for a malformed percent-encoding
   */
  keyFromUrlPath(urlPath: string): string {
    const segments = urlPath.split('/').filter(segment => segment.length > 0)
    return this.toKey(segments.map(decodeURIComponent))
  }

  /**
   * Write an asset, overwriting any previous file with the same key
   *
   * @returns The asset's public URL
   */
  async put(target: AssetTarget, data: Uint8Array, contentType: string): Promise<string> {
    const key = this.getKey(target)
    await this.backend.write(key, data, { contentType })
    logger.debug(`Stored asset ${key} (${data.length} bytes, ${contentType})`)
    return this.getUrl(target)
  }

  async exists(target: AssetTarget): Promise<boolean> {
    return this.backend.exists(this.getKey(target))
  }

  /**
   * Remove every asset of a dataset revision
   *
   * @returns Number of files removed
   */
  async deleteDataset(location: Pick<AssetLocation, 'dataset' | 'revision'>): Promise<number> {
    const prefix = this.toKey(this.datasetSegments(location))
    return this.backend.deletePrefix(`${prefix}/`)
  }
}
