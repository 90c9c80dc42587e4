/**
 * Asset writers: encode (where needed) and store one media cell, returning
 * the reference that replaces it in the transformed row
 *
 * @module assets/writers
 */

import {
  AUDIO_MIME_TYPES,
  DEFAULT_MIME_TYPE,
  IMAGE_FORMAT_MIME_TYPES,
  PDF_MIME_TYPE,
  VIDEO_MIME_TYPES,
  type ImageFormat,
} from '../constants'
import { encodeImageFormat, type DecodedImage } from '../codecs/image'
import { FfmpegAudioTranscoder, type AudioTranscoder } from '../codecs/ffmpeg'
import type { OpenedPdf } from '../codecs/pdf'
import type { AudioSource, DocumentSource, ImageSource, VideoSource } from '../types/row'
import type { AssetTarget, StorageClient } from './storage-client'
import { readLocalFile } from './local-files'
import { TypeMismatchError } from '../errors'

// =============================================================================
// Images
// =============================================================================

export interface CreateImageFileOptions {
  client: StorageClient
  target: AssetTarget
  image: DecodedImage
  format: ImageFormat
}

/**
 * Encode an image in one format and store it
 *
 * @throws UnsupportedImageModeError when the format cannot hold the image
 */
export async function createImageFile(options: CreateImageFileOptions): Promise<ImageSource> {
  const { client, target, image, format } = options
  const data = await encodeImageFormat(image, format)
  const src = await client.put(target, data, IMAGE_FORMAT_MIME_TYPES[format])
  return { src, height: image.height, width: image.width }
}

// =============================================================================
// Audio
// =============================================================================

export interface CreateAudioFileOptions {
  client: StorageClient
  target: AssetTarget
  data: Uint8Array
  /** Extension of `data`, null when unknown */
  sourceExtension: string | null
  /** Extension the stored file must have */
  targetExtension: string
  /** Used when the two extensions differ; defaults to ffmpeg on the PATH */
  transcoder?: AudioTranscoder | undefined
}

let defaultTranscoder: AudioTranscoder | undefined

function getDefaultTranscoder(): AudioTranscoder {
  if (!defaultTranscoder) {
    defaultTranscoder = new FfmpegAudioTranscoder()
  }
  return defaultTranscoder
}

/**
 * Store an audio file, transcoding it first when its format is not the
 * target one
 */
export async function createAudioFile(options: CreateAudioFileOptions): Promise<AudioSource[]> {
  const { client, target, sourceExtension, targetExtension } = options
  let data = options.data
  if (sourceExtension !== targetExtension) {
    const transcoder = options.transcoder ?? getDefaultTranscoder()
    data = await transcoder.transcode(data, sourceExtension, targetExtension)
  }
  const type = AUDIO_MIME_TYPES[targetExtension] ?? DEFAULT_MIME_TYPE
  const src = await client.put(target, data, type)
  return [{ src, type }]
}

// =============================================================================
// Video
// =============================================================================

export interface CreateVideoFileOptions {
  client: StorageClient
  target: AssetTarget
  /** Encoded video; read from `path` when null */
  bytes: Uint8Array | null
  path: string | null
  extension: string
}

/**
 * Store an encoded video as-is
 *
 * @throws FileNotFoundError when there are no bytes and no file at `path`
 */
export async function createVideoFile(options: CreateVideoFileOptions): Promise<VideoSource> {
  const { client, target, bytes, path, extension } = options
  let data: Uint8Array
  if (bytes !== null) {
    data = bytes
  } else if (path !== null) {
    data = await readLocalFile(path)
  } else {
    throw new TypeMismatchError('A video needs bytes or a path', { column: target.column, rowIdx: target.rowIdx })
  }
  const src = await client.put(target, data, VIDEO_MIME_TYPES[extension.toLowerCase()] ?? DEFAULT_MIME_TYPE)
  return { src }
}

// =============================================================================
// Documents
// =============================================================================

export interface CreatePdfFileOptions {
  client: StorageClient
  target: AssetTarget
  pdf: OpenedPdf
}

export async function createPdfFile(options: CreatePdfFileOptions): Promise<DocumentSource> {
  const { client, target, pdf } = options
  const src = await client.put(target, pdf.bytes, PDF_MIME_TYPE)
  return { src, sizeBytes: pdf.bytes.length, pageCount: pdf.pageCount }
}
