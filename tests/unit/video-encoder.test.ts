/**
 * Video encoder tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import { encodeVideo } from '../../src/features/encoders/video'
import { DecodedVideo } from '../../src/codecs/video'
import { FileNotFoundError, MissingExtensionError, TypeMismatchError } from '../../src/errors'
import type { AssetContext } from '../../src/features/encoders/context'
import type { StructuralPath } from '../../src/types/row'
import { assetKey, assetUrl, createAssetContext, createTempDir, type TempDir } from '../helpers'

function input(context: AssetContext, value: unknown, path: StructuralPath = []) {
  return { context, rowIdx: 2, value, column: 'video', path }
}

const VIDEO_BYTES = new Uint8Array([0x00, 0x00, 0x00, 0x18, 0x66, 0x74, 0x79, 0x70])

describe('encodeVideo', () => {
  let dir: TempDir
  let localVideo: string

  beforeAll(async () => {
    dir = await createTempDir()
    localVideo = await dir.writeFile('clip.webm', VIDEO_BYTES)
  })

  afterAll(async () => {
    await dir.cleanup()
  })

  it('returns null for a null cell', async () => {
    const { context } = createAssetContext()
    expect(await encodeVideo(input(context, null))).toBeNull()
  })

  it('stores the bytes under the extension of the path', async () => {
    const { context, backend } = createAssetContext()
    const result = await encodeVideo(input(context, { bytes: VIDEO_BYTES, path: 'clip.mp4' }))

    expect(result).toEqual({ src: assetUrl(2, 'video', 'video.mp4') })
    const key = assetKey(2, 'video', 'video.mp4')
    expect(await backend.read(key)).toEqual(VIDEO_BYTES)
    expect((await backend.stat(key))?.contentType).toBe('video/mp4')
  })

  it('keeps the case of the extension', async () => {
    const { context, backend } = createAssetContext()
    const result = await encodeVideo(input(context, { bytes: VIDEO_BYTES, path: 'CLIP.MOV' }))

    expect(result?.src).toBe(assetUrl(2, 'video', 'video.MOV'))
    expect((await backend.stat(assetKey(2, 'video', 'video.MOV')))?.contentType).toBe('video/quicktime')
  })

  it('stores unknown extensions as octet streams', async () => {
    const { context, backend } = createAssetContext()
    await encodeVideo(input(context, { bytes: VIDEO_BYTES, path: 'clip.xyz' }))
    expect((await backend.stat(assetKey(2, 'video', 'video.xyz')))?.contentType).toBe(
      'application/octet-stream'
    )
  })

  it('reads local files given as a path string or a decoded video', async () => {
    const { context, backend } = createAssetContext()

    expect(await encodeVideo(input(context, localVideo))).toEqual({
      src: assetUrl(2, 'video', 'video.webm'),
    })
    expect(await encodeVideo(input(context, new DecodedVideo({ path: localVideo }), [0, 'a']))).toEqual({
      src: assetUrl(2, 'video', 'video-082401da.webm'),
    })
    expect(await backend.read(assetKey(2, 'video', 'video-082401da.webm'))).toEqual(VIDEO_BYTES)
  })

  it('throws MissingExtensionError without an extension', async () => {
    const { context } = createAssetContext()
    await expect(encodeVideo(input(context, { bytes: VIDEO_BYTES, path: 'clip' }))).rejects.toThrow(
      MissingExtensionError
    )
    await expect(encodeVideo(input(context, VIDEO_BYTES))).rejects.toThrow(
      `A video sample should have a 'path' with a file name and extension, but got no path`
    )
  })

  it('throws FileNotFoundError for a path without bytes or file', async () => {
    const { context } = createAssetContext()
    await expect(encodeVideo(input(context, { path: '/nonexistent/row-assets/a.mp4' }))).rejects.toThrow(
      FileNotFoundError
    )
  })

  it('rejects values that are not videos', async () => {
    const { context } = createAssetContext()
    await expect(encodeVideo(input(context, 5))).rejects.toThrow(TypeMismatchError)
  })
})
