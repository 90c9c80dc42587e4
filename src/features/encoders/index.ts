/**
 * Media encoders
 *
 * @module features/encoders
 */

export { encodeImage } from './image'
export { encodeAudio } from './audio'
export { encodeVideo } from './video'
export { encodeDocument } from './document'
export { getAudioFileExtension, inferAudioFileExtension } from './audio-extension'
export { extensionOf, localPart, type AssetContext, type EncoderInput } from './context'
