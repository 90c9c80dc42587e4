/**
 * Configuration tests
 */

import { describe, it, expect, vi } from 'vitest'
import {
  DEFAULT_BASE_URL,
  configureLogging,
  createStorageBackend,
  loadConfig,
} from '../../src/config'
import { ConfigurationError } from '../../src/errors'
import { FsBackend } from '../../src/storage/FsBackend'
import { MemoryBackend } from '../../src/storage/MemoryBackend'
import { consoleLogger, logger, noopLogger } from '../../src/utils/logger'

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      baseUrl: DEFAULT_BASE_URL,
      storage: { type: 'memory', prefix: undefined },
      concurrency: 8,
      imageFormats: ['JPEG', 'PNG'],
      supportedAudioExtensions: ['.wav', '.mp3'],
      ffmpegPath: 'ffmpeg',
      logLevel: 'warn',
      rowsMaxLength: 100,
    })
  })

  it('reads every variable', () => {
    const config = loadConfig({
      ROW_ASSETS_BASE_URL: 'https://cdn.test/assets',
      ROW_ASSETS_STORAGE: 'fs',
      ROW_ASSETS_STORAGE_ROOT: '/var/lib/row-assets',
      ROW_ASSETS_STORAGE_PREFIX: 'cache',
      ROW_ASSETS_CONCURRENCY: '16',
      ROW_ASSETS_IMAGE_FORMATS: 'WEBP, PNG',
      ROW_ASSETS_AUDIO_EXTENSIONS: '.wav,.mp3,.ogg',
      ROW_ASSETS_FFMPEG_PATH: '/usr/local/bin/ffmpeg',
      ROW_ASSETS_LOG_LEVEL: 'debug',
      ROW_ASSETS_ROWS_MAX_LENGTH: '50',
    })

    expect(config).toEqual({
      baseUrl: 'https://cdn.test/assets',
      storage: { type: 'fs', root: '/var/lib/row-assets', prefix: 'cache' },
      concurrency: 16,
      imageFormats: ['WEBP', 'PNG'],
      supportedAudioExtensions: ['.wav', '.mp3', '.ogg'],
      ffmpegPath: '/usr/local/bin/ffmpeg',
      logLevel: 'debug',
      rowsMaxLength: 50,
    })
  })

  it('treats empty variables as unset', () => {
    expect(loadConfig({ ROW_ASSETS_CONCURRENCY: '', ROW_ASSETS_LOG_LEVEL: '' })).toMatchObject({
      concurrency: 8,
      logLevel: 'warn',
    })
  })

  it('names the invalid variable', () => {
    expect(() => loadConfig({ ROW_ASSETS_CONCURRENCY: 'many' })).toThrow(ConfigurationError)
    expect(() => loadConfig({ ROW_ASSETS_CONCURRENCY: '0' })).toThrow(/^Invalid ROW_ASSETS_CONCURRENCY: /)
    expect(() => loadConfig({ ROW_ASSETS_IMAGE_FORMATS: 'GIF' })).toThrow(/^Invalid ROW_ASSETS_IMAGE_FORMATS: /)
    expect(() => loadConfig({ ROW_ASSETS_AUDIO_EXTENSIONS: 'wav' })).toThrow(
      'Invalid ROW_ASSETS_AUDIO_EXTENSIONS: must look like ".wav"'
    )
    expect(() => loadConfig({ ROW_ASSETS_BASE_URL: 'not a url' })).toThrow(/^Invalid ROW_ASSETS_BASE_URL: /)
  })

  it('requires a root for filesystem storage', () => {
    expect(() => loadConfig({ ROW_ASSETS_STORAGE: 'fs' })).toThrow(
      'ROW_ASSETS_STORAGE_ROOT is required when ROW_ASSETS_STORAGE is "fs"'
    )
  })
})

describe('createStorageBackend', () => {
  it('builds the configured backend', () => {
    expect(createStorageBackend(loadConfig({}))).toBeInstanceOf(MemoryBackend)

    const backend = createStorageBackend(
      loadConfig({ ROW_ASSETS_STORAGE: 'fs', ROW_ASSETS_STORAGE_ROOT: '/tmp/row-assets' })
    )
    expect(backend).toBeInstanceOf(FsBackend)
    expect(backend.type).toBe('fs')
  })
})

describe('configureLogging', () => {
  it('installs a silent logger for "silent"', () => {
    configureLogging({ logLevel: 'silent' })
    expect(logger).toBe(noopLogger)
  })

  it('installs a console logger filtered by level', () => {
    const warn = vi.spyOn(consoleLogger, 'warn').mockImplementation(() => {})
    const info = vi.spyOn(consoleLogger, 'info').mockImplementation(() => {})
    try {
      configureLogging({ logLevel: 'warn' })
      logger.info('hidden')
      logger.warn('shown')

      expect(info).not.toHaveBeenCalled()
      expect(warn).toHaveBeenCalledWith('shown')
    } finally {
      warn.mockRestore()
      info.mockRestore()
    }
  })
})
