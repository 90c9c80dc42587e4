/**
 * Audio file extension detection
 *
 * @module features/encoders/audio-extension
 */

import { AUDIO_FILE_MAGIC_NUMBERS, type MagicNumber } from '../../constants'
import { DecodedAudio } from '../../codecs/audio'
import type { EncodedMedia } from '../../types/row'
import { extensionOf } from './context'

function startsWith(data: Uint8Array, { bytes, offset }: MagicNumber): boolean {
  if (data.length < offset + bytes.length) {
    return false
  }
  return bytes.every((byte, i) => data[offset + i] === byte)
}

/**
 * Infer an audio file's extension from its first bytes
 *
 * @returns '.wav' or '.mp3', or null when no signature matches
 */
export function inferAudioFileExtension(data: Uint8Array): string | null {
  for (const [extension, rule] of AUDIO_FILE_MAGIC_NUMBERS) {
    const matched =
      rule.match === 'all'
        ? rule.magicNumbers.every(magic => startsWith(data, magic))
        : rule.magicNumbers.some(magic => startsWith(data, magic))
    if (matched) {
      return extension
    }
  }
  return null
}

/**
 * Extension declared by an audio value, before looking at its bytes
 *
 * - a descriptor: the extension of its path (null without one, or when the
 *   path has none, as for files downloaded from a hub cache)
 * - decoded audio that kept its encoded bytes: the extension of the encoded
 *   path, null without one so the bytes get sniffed
 * - decoded audio from samples only: '.wav', the format it gets re-encoded to
 */
export function getAudioFileExtension(value: EncodedMedia | DecodedAudio): string | null {
  if (value instanceof DecodedAudio) {
    const { encoded } = value
    if (!encoded || !(encoded.bytes instanceof Uint8Array)) {
      return '.wav'
    }
    return typeof encoded.path === 'string' ? extensionOf(encoded.path) || null : null
  }
  return typeof value.path === 'string' ? extensionOf(value.path) || null : null
}
