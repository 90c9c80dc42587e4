/**
 * Shared encoder types
 */

import type { StorageClient } from '../../assets/storage-client'
import type { AudioTranscoder } from '../../codecs/ffmpeg'
import type { ImageFormat } from '../../constants'
import type { AssetLocation, StructuralPath } from '../../types/row'
import type { CellErrorContext } from '../../errors'

/**
 * Everything a media encoder needs besides the cell itself
 */
export interface AssetContext {
  /** Dataset split the rows belong to */
  location: AssetLocation
  storage: StorageClient
  /** Image formats tried in order (default JPEG, then PNG) */
  imageFormats?: readonly ImageFormat[] | undefined
  /** Audio extensions stored without transcoding (default .wav, .mp3) */
  supportedAudioExtensions?: readonly string[] | undefined
  transcoder?: AudioTranscoder | undefined
}

/** Input of every media encoder */
export interface EncoderInput {
  context: AssetContext
  rowIdx: number
  value: unknown
  column: string
  /** Where the value sits in its cell */
  path: StructuralPath
}

export function errorContext(input: EncoderInput): CellErrorContext {
  return { column: input.column, rowIdx: input.rowIdx, path: input.path }
}

/**
 * Part of a dataset file path before the `::` chaining separator
 *
 * @example
 * ```typescript
 * localPart('clip.mp4::https://host/archive.zip') // 'clip.mp4'
 * ```
 */
export function localPart(path: string): string {
  const index = path.indexOf('::')
  return index === -1 ? path : path.slice(0, index)
}

/**
 * Extension of a file path, with its dot; '' when there is none
 */
export function extensionOf(path: string): string {
  const base = localPart(path).split('/').pop() ?? ''
  const dot = base.lastIndexOf('.')
  return dot > 0 ? base.slice(dot) : ''
}
