export { StorageClient, type AssetTarget, type StorageClientOptions } from './storage-client'
export {
  createImageFile,
  createAudioFile,
  createVideoFile,
  createPdfFile,
  type CreateImageFileOptions,
  type CreateAudioFileOptions,
  type CreateVideoFileOptions,
  type CreatePdfFileOptions,
} from './writers'
export { localFileExists, readLocalFile } from './local-files'
