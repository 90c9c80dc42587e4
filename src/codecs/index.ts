/**
 * Media codecs
 *
 * @module codecs
 */

export {
  DecodedImage,
  UnsupportedImageModeError,
  decodeImage,
  encodeImageFormat,
  type ImageChannels,
  type ImageMode,
} from './image'
export { DecodedAudio, encodeWav } from './audio'
export { DecodedVideo } from './video'
export { PDFDocument, openPdf, savePdf, type OpenedPdf } from './pdf'
export { FfmpegAudioTranscoder, type AudioTranscoder } from './ffmpeg'
