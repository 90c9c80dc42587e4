/**
 * Audio encoder tests
 */

import { describe, it, expect, afterEach } from 'vitest'
import { encodeAudio } from '../../src/features/encoders/audio'
import {
  getAudioFileExtension,
  inferAudioFileExtension,
} from '../../src/features/encoders/audio-extension'
import { DecodedAudio, encodeWav } from '../../src/codecs/audio'
import { TypeMismatchError } from '../../src/errors'
import type { AssetContext } from '../../src/features/encoders/context'
import type { StructuralPath } from '../../src/types/row'
import {
  assetKey,
  assetUrl,
  createAssetContext,
  createFakeTranscoder,
  createMp3Like,
  createTempDir,
  createWav,
  type TempDir,
} from '../helpers'

function input(context: AssetContext, value: unknown, path: StructuralPath = []) {
  return { context, rowIdx: 0, value, column: 'audio', path }
}

function withPrefix(prefix: string, data: Uint8Array): Uint8Array {
  return new Uint8Array([...new TextEncoder().encode(prefix), ...data])
}

// =============================================================================
// Extension detection
// =============================================================================

describe('inferAudioFileExtension', () => {
  it('recognizes WAV by its RIFF and WAVE markers', () => {
    expect(inferAudioFileExtension(createWav())).toBe('.wav')
  })

  it('recognizes MP3 frames and ID3 tags', () => {
    expect(inferAudioFileExtension(createMp3Like())).toBe('.mp3')
    expect(inferAudioFileExtension(new Uint8Array([0xff, 0xfb, 0x90, 0x00]))).toBe('.mp3')
  })

  it('returns null for anything else', () => {
    expect(inferAudioFileExtension(new Uint8Array([1, 2, 3]))).toBeNull()
    // RIFF without WAVE
    expect(inferAudioFileExtension(new TextEncoder().encode('RIFF\0\0\0\0AVI '))).toBeNull()
  })
})

describe('getAudioFileExtension', () => {
  it('takes the extension of a descriptor path', () => {
    expect(getAudioFileExtension({ path: 'clips/a.FLAC', bytes: null })).toBe('.FLAC')
    expect(getAudioFileExtension({ path: 'a.mp3::https://host/archive.zip' })).toBe('.mp3')
  })

  it('returns null without a path or extension', () => {
    expect(getAudioFileExtension({ bytes: new Uint8Array(1) })).toBeNull()
    expect(getAudioFileExtension({ path: 'cache/0f3a9c' })).toBeNull()
  })

  it('uses .wav for decoded audio without encoded bytes', () => {
    expect(getAudioFileExtension(new DecodedAudio([0], 8000))).toBe('.wav')
  })

  it('uses the encoded path of decoded audio that kept its bytes', () => {
    const data = new Uint8Array([1])
    expect(getAudioFileExtension(new DecodedAudio([0], 8000, { path: 'a.ogg', bytes: data }))).toBe('.ogg')
    expect(getAudioFileExtension(new DecodedAudio([0], 8000, { bytes: data }))).toBeNull()
  })
})

// =============================================================================
// encodeAudio
// =============================================================================

describe('encodeAudio', () => {
  it('returns null for a null cell', async () => {
    const { context } = createAssetContext()
    expect(await encodeAudio(input(context, null))).toBeNull()
  })

  it('stores a supported file as-is', async () => {
    const { transcoder, transcode } = createFakeTranscoder()
    const { context, backend } = createAssetContext({ transcoder })
    const wav = createWav()

    const result = await encodeAudio(input(context, { bytes: wav, path: 'speech.wav' }))

    expect(result).toEqual([{ src: assetUrl(0, 'audio', 'audio.wav'), type: 'audio/wav' }])
    expect(await backend.read(assetKey(0, 'audio', 'audio.wav'))).toEqual(wav)
    expect(transcode).not.toHaveBeenCalled()
  })

  it('sniffs the format of bytes without a path', async () => {
    const { transcoder, transcode } = createFakeTranscoder()
    const { context } = createAssetContext({ transcoder })

    const result = await encodeAudio(input(context, { bytes: createMp3Like(), path: null }))

    expect(result).toEqual([{ src: assetUrl(0, 'audio', 'audio.mp3'), type: 'audio/mpeg' }])
    expect(transcode).not.toHaveBeenCalled()
  })

  it('transcodes unsupported formats to WAV', async () => {
    const { transcoder, transcode } = createFakeTranscoder()
    const { context, backend } = createAssetContext({ transcoder })
    const flac = new Uint8Array([0x66, 0x4c, 0x61, 0x43])

    const result = await encodeAudio(input(context, { bytes: flac, path: 'song.flac' }))

    expect(result).toEqual([{ src: assetUrl(0, 'audio', 'audio.wav'), type: 'audio/wav' }])
    expect(transcode).toHaveBeenCalledWith(flac, '.flac', '.wav')
    expect(await backend.read(assetKey(0, 'audio', 'audio.wav'))).toEqual(withPrefix('.wav', flac))
  })

  it('transcodes bytes of an unknown format', async () => {
    const { transcoder, transcode } = createFakeTranscoder()
    const { context } = createAssetContext({ transcoder })
    const data = new Uint8Array([1, 2, 3])

    await encodeAudio(input(context, { bytes: data }))

    expect(transcode).toHaveBeenCalledWith(data, null, '.wav')
  })

  it('honors the configured supported extensions', async () => {
    const { transcoder, transcode } = createFakeTranscoder()
    const { context } = createAssetContext({ transcoder, supportedAudioExtensions: ['.wav'] })

    const result = await encodeAudio(input(context, { bytes: createMp3Like(), path: 'a.mp3' }))

    expect(result?.[0]?.src).toBe(assetUrl(0, 'audio', 'audio.wav'))
    expect(transcode).toHaveBeenCalledTimes(1)
  })

  it('writes decoded samples as WAV', async () => {
    const { transcoder, transcode } = createFakeTranscoder()
    const { context, backend } = createAssetContext({ transcoder })
    const audio = new DecodedAudio([0, 0.25, -0.25], 22050)

    const result = await encodeAudio(input(context, audio))

    expect(result).toEqual([{ src: assetUrl(0, 'audio', 'audio.wav'), type: 'audio/wav' }])
    expect(await backend.read(assetKey(0, 'audio', 'audio.wav'))).toEqual(encodeWav(audio))
    expect(transcode).not.toHaveBeenCalled()
  })

  it('serves the encoded bytes decoded audio kept', async () => {
    const { transcoder, transcode } = createFakeTranscoder()
    const { context, backend } = createAssetContext({ transcoder })
    const mp3 = createMp3Like()

    const result = await encodeAudio(input(context, new DecodedAudio([0], 8000, { bytes: mp3 })))

    expect(result?.[0]?.src).toBe(assetUrl(0, 'audio', 'audio.mp3'))
    expect(await backend.read(assetKey(0, 'audio', 'audio.mp3'))).toEqual(mp3)
    expect(transcode).not.toHaveBeenCalled()
  })

  it('suffixes the file name with the hash of a nested path', async () => {
    const { context } = createAssetContext()
    const result = await encodeAudio(input(context, { bytes: createWav(), path: 'x.wav' }, ['a']))
    expect(result?.[0]?.src).toBe(assetUrl(0, 'audio', 'audio-0418015e.wav'))
  })

  it('rejects values that are not audio', async () => {
    const { context } = createAssetContext()
    await expect(encodeAudio(input(context, 'speech.wav'))).rejects.toThrow(TypeMismatchError)
    await expect(encodeAudio(input(context, { path: '/nonexistent/row-assets/a.wav' }))).rejects.toThrow(
      `An audio sample should have 'bytes' or the 'path' of an existing file, but got {"path":"/nonexistent/row-assets/a.wav"}`
    )
  })

  describe('local paths', () => {
    let dir: TempDir | undefined

    afterEach(async () => {
      await dir?.cleanup()
      dir = undefined
    })

    it('reads the file at an existing path', async () => {
      dir = await createTempDir()
      const mp3 = createMp3Like()
      const path = await dir.writeFile('clip.mp3', mp3)
      const { context, backend } = createAssetContext()

      const result = await encodeAudio(input(context, { path, bytes: null }))

      expect(result).toEqual([{ src: assetUrl(0, 'audio', 'audio.mp3'), type: 'audio/mpeg' }])
      expect(await backend.read(assetKey(0, 'audio', 'audio.mp3'))).toEqual(mp3)
    })
  })
})
