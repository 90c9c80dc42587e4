/**
 * Application wiring tests
 */

import { describe, it, expect } from 'vitest'
import { setTimeout as sleep } from 'node:timers/promises'
import { createApp } from '../../src/server/app'
import { loadConfig } from '../../src/config'
import { DecodedImage } from '../../src/codecs/image'
import { FfmpegAudioTranscoder } from '../../src/codecs/ffmpeg'
import { MemoryBackend } from '../../src/storage/MemoryBackend'
import { Audio, Image, Value } from '../../src/types/features'
import type { WriteOptions, WriteResult } from '../../src/types/storage'
import { ArrayRowSource, TEST_LOCATION, createFakeTranscoder, createMp3Like } from '../helpers'

const RED = DecodedImage.filled(3, 2, [255, 0, 0])

/**
 * Memory backend recording how many writes run at once
 */
class TrackingBackend extends MemoryBackend {
  active = 0
  maxActive = 0

  override async write(path: string, data: Uint8Array, options?: WriteOptions): Promise<WriteResult> {
    this.active++
    this.maxActive = Math.max(this.maxActive, this.active)
    try {
      await sleep(20)
      return await super.write(path, data, options)
    } finally {
      this.active--
    }
  }
}

describe('createApp', () => {
  it('stores assets under the configured prefix and links them from the base URL', async () => {
    const config = loadConfig({
      ROW_ASSETS_BASE_URL: 'https://cdn.test/files',
      ROW_ASSETS_STORAGE_PREFIX: 'cache',
      ROW_ASSETS_IMAGE_FORMATS: 'PNG',
    })
    const backend = new MemoryBackend()
    const { app } = createApp(config, {
      source: new ArrayRowSource({ image: Image() }, [{ image: RED }]),
      location: TEST_LOCATION,
      backend,
    })

    const res = await app.request('/rows')

    expect(await res.json()).toMatchObject({
      rows: [
        {
          row_idx: 0,
          row: {
            image: {
              src: 'https://cdn.test/files/user%2Fds/--/main/--/default/train/0/image/image.png',
              height: 2,
              width: 3,
            },
          },
        },
      ],
    })
    expect(await backend.exists('cache/user/ds/--/main/--/default/train/0/image/image.png')).toBe(true)

    const asset = await app.request('/files/user%2Fds/--/main/--/default/train/0/image/image.png')
    expect(asset.status).toBe(200)
    expect(asset.headers.get('Content-Type')).toBe('image/png')
  })

  it('caps pages at the configured maximum length', async () => {
    const config = loadConfig({ ROW_ASSETS_ROWS_MAX_LENGTH: '2' })
    const { app } = createApp(config, {
      source: new ArrayRowSource({ id: Value('int64') }, [{ id: 0 }, { id: 1 }, { id: 2 }]),
      location: TEST_LOCATION,
    })

    expect(await (await app.request('/rows')).json()).toMatchObject({
      rows: [{ row_idx: 0 }, { row_idx: 1 }],
      num_rows_total: 3,
      num_rows_per_page: 2,
    })
    expect((await app.request('/rows?length=3')).status).toBe(400)
  })

  it('transcodes audio outside the configured extensions', async () => {
    const config = loadConfig({ ROW_ASSETS_AUDIO_EXTENSIONS: '.wav' })
    const { transcoder, transcode } = createFakeTranscoder()
    const { app } = createApp(config, {
      source: new ArrayRowSource({ audio: Audio() }, [{ audio: { bytes: createMp3Like(), path: 'a.mp3' } }]),
      location: TEST_LOCATION,
      transcoder,
    })

    const res = await app.request('/rows')

    expect(await res.json()).toMatchObject({
      rows: [
        {
          row: {
            audio: [
              {
                src: 'http://localhost:8080/assets/user%2Fds/--/main/--/default/train/0/audio/audio.wav',
                type: 'audio/wav',
              },
            ],
          },
        },
      ],
    })
    expect(transcode).toHaveBeenCalledWith(createMp3Like(), '.mp3', '.wav')
  })

  it('runs ffmpeg from the configured path', async () => {
    const config = loadConfig({
      ROW_ASSETS_AUDIO_EXTENSIONS: '.wav',
      ROW_ASSETS_FFMPEG_PATH: '/nonexistent/row-assets-ffmpeg',
    })
    const { app, transcoder } = createApp(config, {
      source: new ArrayRowSource({ audio: Audio() }, [{ audio: { bytes: createMp3Like(), path: 'a.mp3' } }]),
      location: TEST_LOCATION,
    })

    const res = await app.request('/rows')

    expect(transcoder).toBeInstanceOf(FfmpegAudioTranscoder)
    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({
      error: 'Failed to run /nonexistent/row-assets-ffmpeg',
      code: 'TRANSCODE_FAILED',
    })
  })

  it('transforms rows with the configured concurrency', async () => {
    const rows = [{ image: RED }, { image: RED }, { image: RED }]

    const sequential = new TrackingBackend()
    const one = createApp(loadConfig({ ROW_ASSETS_CONCURRENCY: '1' }), {
      source: new ArrayRowSource({ image: Image() }, rows),
      location: TEST_LOCATION,
      backend: sequential,
    })
    expect((await one.app.request('/rows')).status).toBe(200)
    expect(sequential.maxActive).toBe(1)

    const pooled = new TrackingBackend()
    const three = createApp(loadConfig({ ROW_ASSETS_CONCURRENCY: '3' }), {
      source: new ArrayRowSource({ image: Image() }, rows),
      location: TEST_LOCATION,
      backend: pooled,
    })
    expect((await three.app.request('/rows')).status).toBe(200)
    expect(pooled.maxActive).toBeGreaterThan(1)
  })
})
