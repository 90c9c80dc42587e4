/**
 * Decoded video handle
 *
 * Videos are never decoded to frames here: the handle keeps the encoded
 * source it was opened from, and that source is what gets stored.
 *
 * @module codecs/video
 */

import type { EncodedMedia } from '../types/row'

export class DecodedVideo {
  readonly path: string | null
  readonly bytes: Uint8Array | null

  constructor(source: EncodedMedia) {
    this.path = source.path ?? null
    this.bytes = source.bytes ?? null
    if (this.path === null && this.bytes === null) {
      throw new RangeError('A video needs a path or bytes')
    }
  }

  /** The encoded source, as found in dataset cells */
  get encoded(): { path: string | null; bytes: Uint8Array | null } {
    return { path: this.path, bytes: this.bytes }
  }
}
