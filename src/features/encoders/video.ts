/**
 * Video cells to stored video assets
 *
 * @module features/encoders/video
 */

import { DecodedVideo } from '../../codecs/video'
import { MissingExtensionError, TypeMismatchError } from '../../errors'
import { createVideoFile } from '../../assets/writers'
import type { VideoSource } from '../../types/row'
import { describeValue, isBytes, isPlainObject } from '../../utils/describe'
import { appendHashSuffix } from '../path-hash'
import { errorContext, extensionOf, type EncoderInput } from './context'

interface EncodedVideo {
  path: string | null
  bytes: Uint8Array | null
}

function toEncodedVideo(input: EncoderInput): EncodedVideo {
  const { value } = input
  if (value instanceof DecodedVideo) {
    return value.encoded
  }
  if (isPlainObject(value)) {
    return {
      path: typeof value.path === 'string' ? value.path : null,
      bytes: isBytes(value.bytes) ? value.bytes : null,
    }
  }
  if (isBytes(value)) {
    return { path: null, bytes: value }
  }
  if (typeof value === 'string') {
    return { path: value, bytes: null }
  }
  throw new TypeMismatchError(
    `Video cell must be a decoded video or an encoded dict of a video, but got ${describeValue(value)}`,
    { ...errorContext(input), expected: 'Video' }
  )
}

/**
 * Store a video cell as-is, named after the extension of its path
 *
 * @returns null for a null cell
 * @throws MissingExtensionError when the path is missing or has no extension
 */
export async function encodeVideo(input: EncoderInput): Promise<VideoSource | null> {
  const { value, context, rowIdx, column, path } = input
  if (value === null || value === undefined) {
    return null
  }
  const video = toEncodedVideo(input)
  const extension = video.path === null ? '' : extensionOf(video.path)
  if (!extension) {
    throw new MissingExtensionError('video', video.path, errorContext(input))
  }

  return createVideoFile({
    client: context.storage,
    target: {
      location: context.location,
      rowIdx,
      column,
      filename: `${appendHashSuffix('video', path)}${extension}`,
    },
    bytes: video.bytes,
    path: video.path,
    extension,
  })
}
