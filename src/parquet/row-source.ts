/**
 * Parquet row source using hyparquet
 *
 * Reads pages of rows and the dataset feature schema from one Parquet file
 * through any StorageBackend.
 *
 * @module parquet/row-source
 */

import { parquetMetadataAsync, parquetReadObjects } from 'hyparquet'
import type { AsyncBuffer, FileMetaData, KeyValue } from 'hyparquet'
import { compressors } from 'hyparquet-compressors'
import type { ReadonlyStorageBackend } from '../types/storage'
import type { Features } from '../types/features'
import type { Row } from '../types/row'
import { FileNotFoundError } from '../errors'
import { parseFeatures } from '../features/parser'
import { logger } from '../utils/logger'

/**
 * A paged source of dataset rows
 */
export interface RowSource {
  getFeatures(): Promise<Features>
  getNumRows(): Promise<number>
  /** Rows of `[offset, offset + length)`, clamped to the source */
  readRows(offset: number, length: number): Promise<Row[]>
}

// =============================================================================
// AsyncBuffer Adapter
// =============================================================================

/**
 * Create an AsyncBuffer over a stored file, fetching its size first
 *
 * hyparquet reads the footer, then only the byte ranges of the column chunks
 * it needs.
 */
export async function initializeAsyncBuffer(
  storage: ReadonlyStorageBackend,
  path: string
): Promise<AsyncBuffer> {
  const stat = await storage.stat(path)
  if (!stat || stat.isDirectory) {
    throw new FileNotFoundError(path)
  }

  const byteLength = stat.size

  return {
    byteLength,
    async slice(start: number, end?: number): Promise<ArrayBuffer> {
      const data = await storage.readRange(path, start, end ?? byteLength)
      // Copy into a fresh ArrayBuffer: the backend may return a view
      const buffer = new ArrayBuffer(data.byteLength)
      new Uint8Array(buffer).set(data)
      return buffer
    },
  }
}

// =============================================================================
// Feature Metadata
// =============================================================================

/** Key/value metadata entry written by dataset libraries */
export const FEATURES_METADATA_KEY = 'huggingface'

/**
 * Feature schema stored in a Parquet file's key/value metadata
 *
 * @returns the parsed schema, or null when the file carries none
 */
export function featuresFromKeyValueMetadata(
  keyValueMetadata: readonly KeyValue[] | undefined
): Features | null {
  const entry = keyValueMetadata?.find(kv => kv.key === FEATURES_METADATA_KEY)
  if (!entry?.value) {
    return null
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(entry.value)
  } catch (error: unknown) {
    logger.warn(`Ignoring malformed "${FEATURES_METADATA_KEY}" metadata`, error)
    return null
  }

  if (typeof parsed !== 'object' || parsed === null || !('info' in parsed)) {
    return null
  }
  const { info } = parsed
  if (typeof info !== 'object' || info === null || !('features' in info)) {
    return null
  }
  return parseFeatures(info.features)
}

/**
 * Fallback schema from the Parquet column types, for files without dataset
 * metadata
 */
function featuresFromSchema(metadata: FileMetaData): Features {
  const features: Features = {}
  // The first element is the root; only top-level columns are listed
  let index = 1
  while (index < metadata.schema.length) {
    const element = metadata.schema[index]
    if (!element) break
    features[element.name] = { _type: 'Value', dtype: dtypeOf(element.type, element.converted_type) }
    index += 1 + countDescendants(metadata, index)
  }
  return features
}

function countDescendants(metadata: FileMetaData, index: number): number {
  const children = metadata.schema[index]?.num_children ?? 0
  let count = 0
  let cursor = index + 1
  for (let i = 0; i < children; i++) {
    const descendants = countDescendants(metadata, cursor)
    count += 1 + descendants
    cursor += 1 + descendants
  }
  return count
}

function dtypeOf(type: string | undefined, convertedType: string | undefined): string {
  if (convertedType === 'UTF8') return 'string'
  switch (type) {
    case 'BOOLEAN':
      return 'bool'
    case 'INT32':
      return 'int32'
    case 'INT64':
      return 'int64'
    case 'FLOAT':
      return 'float32'
    case 'DOUBLE':
      return 'float64'
    case 'BYTE_ARRAY':
    case 'FIXED_LEN_BYTE_ARRAY':
      return 'binary'
    default:
      return 'null'
  }
}

// =============================================================================
// ParquetRowSource
// =============================================================================

export interface ParquetRowSourceOptions {
  /** Schema to use instead of the one stored in the file */
  features?: Features | undefined
}

/**
 * Rows of one Parquet file
 *
 * @example
 * ```typescript
 * const source = new ParquetRowSource(storage, 'train/0000.parquet')
 * const rows = await source.readRows(0, 100)
 * ```
 */
export class ParquetRowSource implements RowSource {
  private metadata: Promise<{ file: AsyncBuffer; metadata: FileMetaData }> | undefined

  constructor(
    private readonly storage: ReadonlyStorageBackend,
    readonly path: string,
    private readonly options: ParquetRowSourceOptions = {}
  ) {}

  /**
   * Footer metadata, read once
   *
   * A failed read is not kept, so the next call tries again.
   */
  private load(): Promise<{ file: AsyncBuffer; metadata: FileMetaData }> {
    if (!this.metadata) {
      this.metadata = (async () => {
        try {
          const file = await initializeAsyncBuffer(this.storage, this.path)
          const metadata = await parquetMetadataAsync(file)
          return { file, metadata }
        } catch (error: unknown) {
          this.metadata = undefined
          throw error
        }
      })()
    }
    return this.metadata
  }

  async getNumRows(): Promise<number> {
    const { metadata } = await this.load()
    return Number(metadata.num_rows)
  }

  async getFeatures(): Promise<Features> {
    if (this.options.features) {
      return this.options.features
    }
    const { metadata } = await this.load()
    return featuresFromKeyValueMetadata(metadata.key_value_metadata) ?? featuresFromSchema(metadata)
  }

  async readRows(offset: number, length: number): Promise<Row[]> {
    if (!Number.isInteger(offset) || offset < 0 || !Number.isInteger(length) || length < 0) {
      throw new RangeError(`Invalid row range: offset ${offset}, length ${length}`)
    }
    const { file, metadata } = await this.load()
    const numRows = Number(metadata.num_rows)
    const rowEnd = Math.min(offset + length, numRows)
    if (offset >= rowEnd) {
      return []
    }

    logger.debug(`Reading rows [${offset}, ${rowEnd}) of ${this.path}`)
    return parquetReadObjects({
      file,
      metadata,
      rowStart: offset,
      rowEnd,
      compressors,
      // Binary columns (encoded media) must stay bytes
      utf8: false,
    })
  }
}
