/**
 * Image cells to stored image assets
 *
 * @module features/encoders/image
 */

import { DecodedImage, UnsupportedImageModeError, decodeImage } from '../../codecs/image'
import { DEFAULT_IMAGE_FORMATS, IMAGE_FORMAT_EXTENSIONS } from '../../constants'
import { EncodingExhaustedError, TypeMismatchError } from '../../errors'
import { createImageFile } from '../../assets/writers'
import { localFileExists } from '../../assets/local-files'
import type { ImageSource } from '../../types/row'
import { describeValue, isBytes, isPlainObject } from '../../utils/describe'
import { appendHashSuffix } from '../path-hash'
import { errorContext, type EncoderInput } from './context'

/**
 * Normalize an image cell to decoded pixels
 *
 * Accepts decoded images, raw encoded bytes, `{bytes}` with non-empty bytes
 * and `{path}` pointing to an existing local file.
 */
async function toDecodedImage(input: EncoderInput): Promise<DecodedImage> {
  const { value } = input
  if (value instanceof DecodedImage) {
    return value
  }
  if (isBytes(value)) {
    return decodeImage(value)
  }
  if (isPlainObject(value)) {
    if (isBytes(value.bytes) && value.bytes.length > 0) {
      return decodeImage(value.bytes)
    }
    if (typeof value.path === 'string' && (await localFileExists(value.path))) {
      return decodeImage(value.path)
    }
  }
  throw new TypeMismatchError(
    `Image cell must be a decoded image or an encoded dict of an image, but got ${describeValue(value)}`,
    { ...errorContext(input), expected: 'Image' }
  )
}

/**
 * Store an image cell in the first configured format that can hold it
 *
 * A format that cannot represent the image's pixel layout (alpha as JPEG)
 * hands over to the next one; any other failure propagates.
 *
 * @returns null for a null cell
 */
export async function encodeImage(input: EncoderInput): Promise<ImageSource | null> {
  if (input.value === null || input.value === undefined) {
    return null
  }
  const image = await toDecodedImage(input)
  const { context, rowIdx, column, path } = input
  const formats = context.imageFormats ?? DEFAULT_IMAGE_FORMATS

  let lastError: UnsupportedImageModeError | undefined
  for (const format of formats) {
    try {
      return await createImageFile({
        client: context.storage,
        target: {
          location: context.location,
          rowIdx,
          column,
          filename: `${appendHashSuffix('image', path)}${IMAGE_FORMAT_EXTENSIONS[format]}`,
        },
        image,
        format,
      })
    } catch (error: unknown) {
      if (!(error instanceof UnsupportedImageModeError)) {
        throw error
      }
      lastError = error
    }
  }
  throw new EncodingExhaustedError('Image', formats, errorContext(input), lastError)
}
