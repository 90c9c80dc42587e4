/**
 * Application wiring
 *
 * Assembles the rows and asset routes from a loaded `AppConfig`: storage
 * backend, asset storage client, audio transcoder and route options.
 *
 * @example
 * ```typescript
 * const config = loadConfig()
 * configureLogging(config)
 * const { app } = createApp(config, {
 *   source: new ParquetRowSource(new FsBackend('/data'), 'ds/train/0000.parquet'),
 *   location: { dataset: 'ds', revision: 'main', config: 'default', split: 'train' },
 * })
 * ```
 *
 * @module
 */

import { Hono } from 'hono'
import { StorageClient } from '../assets/storage-client'
import { FfmpegAudioTranscoder, type AudioTranscoder } from '../codecs/ffmpeg'
import { createStorageBackend, type AppConfig } from '../config'
import type { RowSource } from '../parquet/row-source'
import type { FeatureType } from '../types/features'
import type { AssetLocation } from '../types/row'
import type { StorageBackend } from '../types/storage'
import { createAssetRoutes } from './assets'
import { createRowsRoutes } from './rows'

export interface AppOptions {
  source: RowSource
  location: AssetLocation
  /** Replaces the backend the configuration names */
  backend?: StorageBackend | undefined
  /** Replaces the ffmpeg transcoder at `config.ffmpegPath` */
  transcoder?: AudioTranscoder | undefined
  unsupportedFeatures?: readonly FeatureType[] | undefined
}

export interface RowAssetsApp {
  app: Hono
  storage: StorageClient
  transcoder: AudioTranscoder
}

/**
 * Create the HTTP app serving rows and their assets
 *
 * Assets are served under the path of `config.baseUrl`, so the `src` URLs in
 * row responses resolve when the base URL points at this app.
 */
export function createApp(config: AppConfig, options: AppOptions): RowAssetsApp {
  const backend = options.backend ?? createStorageBackend(config)
  const storage = new StorageClient(backend, {
    baseUrl: config.baseUrl,
    prefix: config.storage.prefix,
  })
  const transcoder = options.transcoder ?? new FfmpegAudioTranscoder(config.ffmpegPath)

  const app = new Hono()
  app.route(
    '/',
    createRowsRoutes({
      source: options.source,
      location: options.location,
      storage,
      rowsMaxLength: config.rowsMaxLength,
      unsupportedFeatures: options.unsupportedFeatures,
      concurrency: config.concurrency,
      imageFormats: config.imageFormats,
      supportedAudioExtensions: config.supportedAudioExtensions,
      transcoder,
    })
  )
  app.route('/', createAssetRoutes(storage, new URL(config.baseUrl).pathname))

  return { app, storage, transcoder }
}
