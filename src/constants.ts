/**
 * Row Assets Constants
 *
 * Centralized constants: concurrency defaults, the media format tables and
 * the magic numbers used to sniff audio files.
 */

// =============================================================================
// Concurrency
// =============================================================================

/**
 * Default number of rows transformed at once when a batch carries media
 */
export const DEFAULT_CONCURRENCY = 8

// =============================================================================
// Images
// =============================================================================

/** Image formats the image writer knows */
export type ImageFormat = 'JPEG' | 'PNG' | 'WEBP'

/** File extension per image format */
export const IMAGE_FORMAT_EXTENSIONS: Readonly<Record<ImageFormat, string>> = {
  JPEG: '.jpg',
  PNG: '.png',
  WEBP: '.webp',
}

/** MIME type per image format */
export const IMAGE_FORMAT_MIME_TYPES: Readonly<Record<ImageFormat, string>> = {
  JPEG: 'image/jpeg',
  PNG: 'image/png',
  WEBP: 'image/webp',
}

/**
 * Formats tried in order when writing an image; the first one that accepts
 * the image's pixel layout wins
 */
export const DEFAULT_IMAGE_FORMATS: readonly ImageFormat[] = ['JPEG', 'PNG']

// =============================================================================
// Audio
// =============================================================================

/**
 * Audio extensions served as-is; anything else is transcoded to WAV
 */
export const SUPPORTED_AUDIO_EXTENSIONS: readonly string[] = ['.wav', '.mp3']

/** Extension audio falls back to when its own is not supported */
export const FALLBACK_AUDIO_EXTENSION = '.wav'

/** MIME type per served audio extension */
export const AUDIO_MIME_TYPES: Readonly<Record<string, string>> = {
  '.wav': 'audio/wav',
  '.mp3': 'audio/mpeg',
}

/** A byte sequence expected at an offset */
export interface MagicNumber {
  bytes: readonly number[]
  offset: number
}

/**
 * How a file format is recognized from its first bytes:
 * - `all`: every magic number must match
 * - `any`: one magic number at offset 0 is enough
 */
export type MagicNumberRule =
  | { match: 'all'; magicNumbers: readonly MagicNumber[] }
  | { match: 'any'; magicNumbers: readonly MagicNumber[] }

/**
 * Audio signatures, checked in order
 */
export const AUDIO_FILE_MAGIC_NUMBERS: ReadonlyArray<readonly [string, MagicNumberRule]> = [
  [
    '.wav',
    {
      match: 'all',
      magicNumbers: [
        { bytes: [0x52, 0x49, 0x46, 0x46], offset: 0 }, // RIFF
        { bytes: [0x57, 0x41, 0x56, 0x45], offset: 8 }, // WAVE
      ],
    },
  ],
  [
    '.mp3',
    {
      match: 'any',
      magicNumbers: [
        { bytes: [0xff, 0xfb], offset: 0 },
        { bytes: [0xff, 0xf3], offset: 0 },
        { bytes: [0xff, 0xf2], offset: 0 },
        { bytes: [0x49, 0x44, 0x33], offset: 0 }, // ID3
      ],
    },
  ],
]

// =============================================================================
// Assets
// =============================================================================

/** Separates the dataset and revision segments of asset keys */
export const DATASET_SEPARATOR = '--'

/** Longest printed excerpt of a cell in error messages */
export const MAX_VALUE_EXCERPT_LENGTH = 300

// =============================================================================
// Rows API
// =============================================================================

/** Default and maximum page length of the rows endpoint */
export const DEFAULT_ROWS_MAX_LENGTH = 100

// =============================================================================
// Video and Documents
// =============================================================================

/** MIME type per video extension; others are served as octet streams */
export const VIDEO_MIME_TYPES: Readonly<Record<string, string>> = {
  '.mp4': 'video/mp4',
  '.m4v': 'video/mp4',
  '.webm': 'video/webm',
  '.mov': 'video/quicktime',
  '.mkv': 'video/x-matroska',
  '.avi': 'video/x-msvideo',
}

export const DEFAULT_MIME_TYPE = 'application/octet-stream'

export const PDF_MIME_TYPE = 'application/pdf'
