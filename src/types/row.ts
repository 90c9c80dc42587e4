/**
 * Row and asset reference types
 */

/** One dataset row: column name to cell value */
export type Row = Record<string, unknown>

/** Indices and keys locating a cell inside a nested value; empty at the root */
export type StructuralPath = ReadonlyArray<string | number>

/** Where a dataset split lives; scopes every asset written for its rows */
export interface AssetLocation {
  dataset: string
  revision: string
  config: string
  split: string
}

// =============================================================================
// Asset References
// =============================================================================

export interface ImageSource {
  src: string
  height: number
  width: number
}

export interface AudioSource {
  src: string
  /** MIME type */
  type: string
}

export interface VideoSource {
  src: string
}

export interface DocumentSource {
  src: string
  sizeBytes: number
  pageCount: number
}

/** What a media cell becomes once persisted */
export type AssetReference = ImageSource | AudioSource[] | VideoSource | DocumentSource

/** Encoded media as found in dataset cells */
export interface EncodedMedia {
  path?: string | null | undefined
  bytes?: Uint8Array | null | undefined
}
