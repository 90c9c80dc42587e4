/**
 * Configuration
 *
 * Process-level settings read from `ROW_ASSETS_*` environment variables and
 * validated with zod. Library code never reads the environment itself: it
 * takes the values built here as options.
 *
 * @module config
 */

import { z } from 'zod'
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_IMAGE_FORMATS,
  DEFAULT_ROWS_MAX_LENGTH,
  SUPPORTED_AUDIO_EXTENSIONS,
  type ImageFormat,
} from '../constants'
import { ConfigurationError } from '../errors'
import { FsBackend } from '../storage/FsBackend'
import { MemoryBackend } from '../storage/MemoryBackend'
import type { StorageBackend } from '../types/storage'
import { createLevelLogger, noopLogger, setLogger, LOG_LEVELS, type LogLevel } from '../utils/logger'

// =============================================================================
// Schema
// =============================================================================

export const DEFAULT_BASE_URL = 'http://localhost:8080/assets'

const IMAGE_FORMATS = ['JPEG', 'PNG', 'WEBP'] as const satisfies readonly ImageFormat[]

/** Comma separated list, blanks dropped */
const commaList = z
  .string()
  .transform(value => value.split(',').map(item => item.trim()).filter(item => item.length > 0))

const positiveInteger = z.coerce.number().int().positive()

const envSchema = z.object({
  ROW_ASSETS_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  ROW_ASSETS_STORAGE: z.enum(['memory', 'fs']).default('memory'),
  ROW_ASSETS_STORAGE_ROOT: z.string().min(1).optional(),
  ROW_ASSETS_STORAGE_PREFIX: z.string().optional(),
  ROW_ASSETS_CONCURRENCY: positiveInteger.default(DEFAULT_CONCURRENCY),
  ROW_ASSETS_IMAGE_FORMATS: commaList
    .pipe(z.array(z.enum(IMAGE_FORMATS)).min(1))
    .optional(),
  ROW_ASSETS_AUDIO_EXTENSIONS: commaList
    .pipe(z.array(z.string().regex(/^\.[A-Za-z0-9]+$/, 'must look like ".wav"')).min(1))
    .optional(),
  ROW_ASSETS_FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
  ROW_ASSETS_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
  ROW_ASSETS_ROWS_MAX_LENGTH: positiveInteger.default(DEFAULT_ROWS_MAX_LENGTH),
})

// =============================================================================
// AppConfig
// =============================================================================

export interface AppConfig {
  baseUrl: string
  storage:
    | { type: 'memory'; prefix?: string | undefined }
    | { type: 'fs'; root: string; prefix?: string | undefined }
  concurrency: number
  imageFormats: readonly ImageFormat[]
  supportedAudioExtensions: readonly string[]
  ffmpegPath: string
  logLevel: LogLevel
  rowsMaxLength: number
}

/**
 * Load and validate the configuration from environment variables
 *
 * Empty variables count as unset.
 *
 * @throws ConfigurationError naming the first invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present: Record<string, string> = {}
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key]
    if (value !== undefined && value !== '') {
      present[key] = value
    }
  }

  const result = envSchema.safeParse(present)
  if (!result.success) {
    const issue = result.error.issues[0]
    const variable = issue ? String(issue.path[0]) : undefined
    throw new ConfigurationError(
      issue ? `Invalid ${variable}: ${issue.message}` : 'Invalid configuration',
      variable
    )
  }
  const vars = result.data

  let storage: AppConfig['storage']
  if (vars.ROW_ASSETS_STORAGE === 'fs') {
    if (!vars.ROW_ASSETS_STORAGE_ROOT) {
      throw new ConfigurationError(
        'ROW_ASSETS_STORAGE_ROOT is required when ROW_ASSETS_STORAGE is "fs"',
        'ROW_ASSETS_STORAGE_ROOT'
      )
    }
    storage = { type: 'fs', root: vars.ROW_ASSETS_STORAGE_ROOT, prefix: vars.ROW_ASSETS_STORAGE_PREFIX }
  } else {
    storage = { type: 'memory', prefix: vars.ROW_ASSETS_STORAGE_PREFIX }
  }

  return {
    baseUrl: vars.ROW_ASSETS_BASE_URL,
    storage,
    concurrency: vars.ROW_ASSETS_CONCURRENCY,
    imageFormats: vars.ROW_ASSETS_IMAGE_FORMATS ?? DEFAULT_IMAGE_FORMATS,
    supportedAudioExtensions: vars.ROW_ASSETS_AUDIO_EXTENSIONS ?? SUPPORTED_AUDIO_EXTENSIONS,
    ffmpegPath: vars.ROW_ASSETS_FFMPEG_PATH,
    logLevel: vars.ROW_ASSETS_LOG_LEVEL,
    rowsMaxLength: vars.ROW_ASSETS_ROWS_MAX_LENGTH,
  }
}

// =============================================================================
// Wiring
// =============================================================================

/**
 * Build the storage backend the configuration names
 */
export function createStorageBackend(config: AppConfig): StorageBackend {
  switch (config.storage.type) {
    case 'fs':
      return new FsBackend(config.storage.root)
    case 'memory':
      return new MemoryBackend()
  }
}

/**
 * Install the global logger for the configured level
 */
export function configureLogging(config: Pick<AppConfig, 'logLevel'>): void {
  setLogger(config.logLevel === 'silent' ? noopLogger : createLevelLogger(config.logLevel))
}
