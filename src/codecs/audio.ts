/**
 * Audio codec: decoded samples and the 16-bit PCM WAV writer (wavefile)
 *
 * @module codecs/audio
 */

import { WaveFile } from 'wavefile'
import type { EncodedMedia } from '../types/row'

/**
 * Decoded audio: one array of float samples in [-1, 1] per channel
 *
 * When the audio was decoded from a file, `encoded` keeps the original bytes
 * and path so that they can be served without re-encoding.
 */
export class DecodedAudio {
  readonly channels: ReadonlyArray<ArrayLike<number>>

  constructor(
    channels: ArrayLike<number> | ReadonlyArray<ArrayLike<number>>,
    readonly samplingRate: number,
    readonly encoded?: EncodedMedia
  ) {
    this.channels = isChannelList(channels) ? channels : [channels]
    if (this.channels.length === 0) {
      throw new RangeError('Audio must have at least one channel')
    }
    const frames = this.channels[0]?.length ?? 0
    if (this.channels.some(channel => channel.length !== frames)) {
      throw new RangeError('Audio channels must have the same number of samples')
    }
    if (!Number.isInteger(samplingRate) || samplingRate <= 0) {
      throw new RangeError(`Invalid sampling rate: ${samplingRate}`)
    }
  }

  get numChannels(): number {
    return this.channels.length
  }

  /** Samples per channel */
  get numFrames(): number {
    return this.channels[0]?.length ?? 0
  }
}

function isChannelList(
  value: ArrayLike<number> | ReadonlyArray<ArrayLike<number>>
): value is ReadonlyArray<ArrayLike<number>> {
  return Array.isArray(value) && value.length > 0 && typeof value[0] !== 'number'
}

function toInt16(sample: number): number {
  const clamped = Math.max(-1, Math.min(1, sample))
  return Math.round(clamped < 0 ? clamped * 0x8000 : clamped * 0x7fff)
}

/**
 * Encode decoded audio as a 16-bit PCM WAV file
 */
export function encodeWav(audio: DecodedAudio): Uint8Array {
  const { numChannels, numFrames } = audio
  const interleaved = new Int16Array(numChannels * numFrames)
  audio.channels.forEach((channel, c) => {
    for (let i = 0; i < numFrames; i++) {
      interleaved[i * numChannels + c] = toInt16(channel[i] ?? 0)
    }
  })

  const wav = new WaveFile()
  wav.fromScratch(numChannels, audio.samplingRate, '16', interleaved)
  return wav.toBuffer()
}
