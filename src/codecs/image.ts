/**
 * Image codec on top of sharp
 *
 * Images travel through the pipeline as raw interleaved pixels so that the
 * writer can try several output formats against the same decoded data.
 *
 * @module codecs/image
 */

import sharp from 'sharp'
import { ErrorCode, RowAssetsError } from '../errors'
import type { ImageFormat } from '../constants'

/** Interleaved samples per pixel: grey, grey+alpha, RGB, RGBA */
export type ImageChannels = 1 | 2 | 3 | 4

/** Pixel layout names */
export type ImageMode = 'L' | 'LA' | 'RGB' | 'RGBA'

const CHANNEL_MODES: Record<ImageChannels, ImageMode> = {
  1: 'L',
  2: 'LA',
  3: 'RGB',
  4: 'RGBA',
}

function isImageChannels(value: number): value is ImageChannels {
  return value === 1 || value === 2 || value === 3 || value === 4
}

/**
 * Error thrown when an output format cannot represent an image's pixel layout
 */
export class UnsupportedImageModeError extends RowAssetsError {
  override readonly name = 'UnsupportedImageModeError'

  constructor(mode: ImageMode, format: ImageFormat) {
    super(`cannot write mode ${mode} as ${format}`, ErrorCode.UNSUPPORTED_IMAGE_MODE, {
      mode,
      format,
    })
    Object.setPrototypeOf(this, UnsupportedImageModeError.prototype)
  }
}

/**
 * Decoded image: 8-bit raw pixels, row-major, channels interleaved
 */
export class DecodedImage {
  constructor(
    readonly width: number,
    readonly height: number,
    readonly channels: ImageChannels,
    readonly data: Uint8Array
  ) {
    if (!Number.isInteger(width) || width <= 0 || !Number.isInteger(height) || height <= 0) {
      throw new RangeError(`Invalid image size ${width}x${height}`)
    }
    if (data.length !== width * height * channels) {
      throw new RangeError(
        `Expected ${width * height * channels} bytes of pixel data, got ${data.length}`
      )
    }
  }

  get mode(): ImageMode {
    return CHANNEL_MODES[this.channels]
  }

  get hasAlpha(): boolean {
    return this.channels === 2 || this.channels === 4
  }

  /**
   * Image of a single repeated pixel
   *
   * @example
   * ```typescript
   * DecodedImage.filled(2, 2, [255, 0, 0, 128]) // 2x2 RGBA
   * ```
   */
  static filled(width: number, height: number, pixel: readonly number[]): DecodedImage {
    const channels = pixel.length
    if (!isImageChannels(channels)) {
      throw new RangeError(`Unsupported channel count: ${channels}`)
    }
    const data = new Uint8Array(width * height * channels)
    for (let i = 0; i < data.length; i++) {
      data[i] = pixel[i % channels] ?? 0
    }
    return new DecodedImage(width, height, channels, data)
  }
}

/**
 * Decode an encoded image (bytes or a local file path) to raw pixels
 */
export async function decodeImage(input: Uint8Array | string): Promise<DecodedImage> {
  const { data, info } = await sharp(input).raw().toBuffer({ resolveWithObject: true })
  if (!isImageChannels(info.channels)) {
    throw new RowAssetsError(
      `Unsupported channel count: ${info.channels}`,
      ErrorCode.UNSUPPORTED_IMAGE_MODE
    )
  }
  return new DecodedImage(info.width, info.height, info.channels, new Uint8Array(data))
}

/**
 * Encode raw pixels in one output format
 *
 * JPEG has no alpha channel, so images with one are refused rather than
 * silently flattened.
 *
 * @throws UnsupportedImageModeError when the format cannot hold the image's mode
 */
export async function encodeImageFormat(image: DecodedImage, format: ImageFormat): Promise<Uint8Array> {
  const pipeline = sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels },
  })
  switch (format) {
    case 'JPEG':
      if (image.hasAlpha) {
        throw new UnsupportedImageModeError(image.mode, format)
      }
      pipeline.jpeg()
      break
    case 'PNG':
      pipeline.png()
      break
    case 'WEBP':
      pipeline.webp({ lossless: true })
      break
  }
  return new Uint8Array(await pipeline.toBuffer())
}
