/**
 * Audio cells to stored audio assets
 *
 * @module features/encoders/audio
 */

import { DecodedAudio, encodeWav } from '../../codecs/audio'
import { FALLBACK_AUDIO_EXTENSION, SUPPORTED_AUDIO_EXTENSIONS } from '../../constants'
import { TypeMismatchError } from '../../errors'
import { createAudioFile } from '../../assets/writers'
import { localFileExists, readLocalFile } from '../../assets/local-files'
import type { AudioSource, EncodedMedia } from '../../types/row'
import { describeValue, isBytes, isPlainObject } from '../../utils/describe'
import { appendHashSuffix } from '../path-hash'
import { errorContext, type EncoderInput } from './context'
import { getAudioFileExtension, inferAudioFileExtension } from './audio-extension'

function toEncodedMedia(value: Record<string, unknown>): EncodedMedia {
  return {
    path: typeof value.path === 'string' ? value.path : null,
    bytes: isBytes(value.bytes) ? value.bytes : null,
  }
}

/**
 * Encoded bytes of an audio value:
 * 1. the embedded encoded bytes
 * 2. the file at an existing local path
 * 3. decoded samples written as 16-bit PCM WAV
 */
async function getAudioFileBytes(
  value: EncodedMedia | DecodedAudio,
  input: EncoderInput
): Promise<Uint8Array> {
  if (value instanceof DecodedAudio) {
    const bytes = value.encoded?.bytes
    return bytes instanceof Uint8Array ? bytes : encodeWav(value)
  }
  if (value.bytes instanceof Uint8Array) {
    return value.bytes
  }
  if (typeof value.path === 'string' && (await localFileExists(value.path))) {
    return readLocalFile(value.path)
  }
  throw new TypeMismatchError(
    `An audio sample should have 'bytes' or the 'path' of an existing file, but got ${describeValue(input.value)}`,
    { ...errorContext(input), expected: 'Audio' }
  )
}

/**
 * Store an audio cell, transcoding to WAV when its format is not served as-is
 *
 * @returns null for a null cell
 */
export async function encodeAudio(input: EncoderInput): Promise<AudioSource[] | null> {
  const { value, context, rowIdx, column, path } = input
  if (value === null || value === undefined) {
    return null
  }

  let audio: EncodedMedia | DecodedAudio
  if (value instanceof DecodedAudio) {
    audio = value
  } else if (isPlainObject(value)) {
    audio = toEncodedMedia(value)
  } else {
    throw new TypeMismatchError(
      `Audio cell must be decoded audio or an encoded dict of an audio sample, but got ${describeValue(value)}`,
      { ...errorContext(input), expected: 'Audio' }
    )
  }

  const data = await getAudioFileBytes(audio, input)
  const sourceExtension = getAudioFileExtension(audio) ?? inferAudioFileExtension(data)
  const supported = context.supportedAudioExtensions ?? SUPPORTED_AUDIO_EXTENSIONS
  const targetExtension =
    sourceExtension !== null && supported.includes(sourceExtension)
      ? sourceExtension
      : FALLBACK_AUDIO_EXTENSION

  return createAudioFile({
    client: context.storage,
    target: {
      location: context.location,
      rowIdx,
      column,
      filename: `${appendHashSuffix('audio', path)}${targetExtension}`,
    },
    data,
    sourceExtension,
    targetExtension,
    transcoder: context.transcoder,
  })
}
