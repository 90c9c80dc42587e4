/**
 * row-assets
 *
 * Turns dataset rows into rows whose media cells (images, audio, video,
 * PDF documents) are stored as assets and replaced by lightweight
 * references.
 *
 * @example
 * ```typescript
 * import { MemoryBackend, StorageClient, transformRows, Image, Value } from 'row-assets'
 *
 * const storage = new StorageClient(new MemoryBackend(), { baseUrl: 'https://assets.example.com' })
 * const rows = await transformRows({
 *   rows: [{ id: 0, image: { bytes: pngBytes } }],
 *   features: { id: Value('int64'), image: Image() },
 *   offset: 0,
 *   context: { location: { dataset: 'ds', revision: 'main', config: 'default', split: 'train' }, storage },
 * })
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Types
// =============================================================================

export type {
  FeatureType,
  FeatureTypeName,
  Features,
  FeatureItem,
  ValueFeature,
  ClassLabelFeature,
  TranslationFeature,
  TranslationVariableLanguagesFeature,
  ArrayFeature,
  ImageFeature,
  AudioFeature,
  VideoFeature,
  PdfFeature,
  ListFeature,
  LargeListFeature,
  StructFeature,
  ScalarFeature,
  MediaFeature,
  ContainerFeature,
} from './types/features'
export {
  Value,
  ClassLabel,
  Image,
  Audio,
  Video,
  Pdf,
  List,
  LargeList,
  Struct,
  MEDIA_FEATURE_TYPES,
} from './types/features'

export type {
  Row,
  StructuralPath,
  AssetLocation,
  AssetReference,
  ImageSource,
  AudioSource,
  VideoSource,
  DocumentSource,
  EncodedMedia,
} from './types/row'

export type {
  ReadonlyStorageBackend,
  StorageBackend,
  FileStat,
  ListOptions,
  ListResult,
  WriteOptions,
  WriteResult,
} from './types/storage'

// =============================================================================
// Core
// =============================================================================

export { appendHashSuffix, adler32, serializePath } from './features/path-hash'
export { getCellValue, type CellInput } from './features/cell'
export {
  getSupportedUnsupportedColumns,
  visitFeature,
  someFeature,
  featuresContain,
  type ColumnClassification,
} from './features/classify'
export {
  parseFeature,
  parseFeatures,
  featureToDict,
  featuresToDict,
  toFeaturesList,
} from './features/parser'
export {
  encodeImage,
  encodeAudio,
  encodeVideo,
  encodeDocument,
  getAudioFileExtension,
  inferAudioFileExtension,
  type AssetContext,
  type EncoderInput,
} from './features/encoders'
export {
  transformRow,
  transformRows,
  selectExecutionStrategy,
  mapWithStrategy,
  POOLED_FEATURE_TYPES,
  type TransformRowInput,
  type TransformRowsInput,
  type ExecutionStrategy,
} from './rows'

// =============================================================================
// Media and Assets
// =============================================================================

export {
  DecodedImage,
  DecodedAudio,
  DecodedVideo,
  PDFDocument,
  UnsupportedImageModeError,
  FfmpegAudioTranscoder,
  decodeImage,
  encodeImageFormat,
  encodeWav,
  openPdf,
  savePdf,
  type AudioTranscoder,
  type ImageChannels,
  type ImageMode,
  type OpenedPdf,
} from './codecs'
export {
  StorageClient,
  createImageFile,
  createAudioFile,
  createVideoFile,
  createPdfFile,
  type AssetTarget,
  type StorageClientOptions,
} from './assets'

// =============================================================================
// Storage
// =============================================================================

export { MemoryBackend, FsBackend } from './storage'

// =============================================================================
// Sources and Server
// =============================================================================

export {
  ParquetRowSource,
  initializeAsyncBuffer,
  featuresFromKeyValueMetadata,
  FEATURES_METADATA_KEY,
  type RowSource,
  type ParquetRowSourceOptions,
} from './parquet'
export {
  createRowsRoutes,
  DEFAULT_UNSUPPORTED_FEATURES,
  type RowsRoutesOptions,
  type RowsResponse,
  type RowItem,
} from './server/rows'
export { createAssetRoutes } from './server/assets'
export { createApp, type AppOptions, type RowAssetsApp } from './server/app'
export { statusForError, errorBody } from './server/errors'

// =============================================================================
// Configuration, Logging and Errors
// =============================================================================

export {
  loadConfig,
  createStorageBackend,
  configureLogging,
  DEFAULT_BASE_URL,
  type AppConfig,
} from './config'
export {
  logger,
  setLogger,
  consoleLogger,
  noopLogger,
  createLevelLogger,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
} from './utils/logger'
export {
  ErrorCode,
  RowAssetsError,
  TypeMismatchError,
  ArityMismatchError,
  UnknownFeatureTypeError,
  EncodingExhaustedError,
  MissingExtensionError,
  TranscodeError,
  StorageError,
  FileNotFoundError,
  PathTraversalError,
  ConfigurationError,
  isRowAssetsError,
  isStorageError,
  wrapError,
  type SerializedError,
  type CellErrorContext,
} from './errors'
export * from './constants'
