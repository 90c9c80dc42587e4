/**
 * Rows API Routes
 *
 * Hono route serving pages of dataset rows with their media cells stored as
 * assets and replaced by references.
 *
 * @example
 * ```typescript
 * import { Hono } from 'hono'
 *
 * const app = new Hono()
 * app.route('/', createRowsRoutes({ source, location, storage }))
 *
 * // GET /rows?offset=0&length=10
 * ```
 *
 * @module
 */

import { Hono } from 'hono'
import type { StorageClient } from '../assets/storage-client'
import type { AudioTranscoder } from '../codecs/ffmpeg'
import { DEFAULT_ROWS_MAX_LENGTH, type ImageFormat } from '../constants'
import { ErrorCode } from '../errors'
import { getSupportedUnsupportedColumns } from '../features/classify'
import { toFeaturesList } from '../features/parser'
import type { RowSource } from '../parquet/row-source'
import { transformRows } from '../rows/transform'
import { Value, type FeatureItem, type FeatureType, type Features } from '../types/features'
import type { AssetLocation, Row } from '../types/row'
import { logger } from '../utils/logger'
import { errorBody, statusForError } from './errors'

// =============================================================================
// Types
// =============================================================================

export interface RowsRoutesOptions {
  source: RowSource
  location: AssetLocation
  storage: StorageClient
  /** Largest page a request may ask for */
  rowsMaxLength?: number | undefined
  /**
   * Columns containing any of these features are left out of responses
   *
   * @default DEFAULT_UNSUPPORTED_FEATURES
   */
  unsupportedFeatures?: readonly FeatureType[] | undefined
  concurrency?: number | undefined
  imageFormats?: readonly ImageFormat[] | undefined
  supportedAudioExtensions?: readonly string[] | undefined
  transcoder?: AudioTranscoder | undefined
}

export interface RowItem {
  row_idx: number
  row: Row
  truncated_cells: string[]
}

export interface RowsResponse {
  features: FeatureItem[]
  rows: RowItem[]
  num_rows_total: number
  num_rows_per_page: number
  partial: boolean
}

/** Raw byte columns have no asset form */
export const DEFAULT_UNSUPPORTED_FEATURES: readonly FeatureType[] = [Value('binary'), Value('large_binary')]

// =============================================================================
// Helpers
// =============================================================================

/**
 * Parse a non-negative integer query parameter
 *
 * @returns the default when absent, null when invalid
 */
function parseIntegerParam(value: string | undefined, defaultValue: number): number | null {
  if (value === undefined || value === '') {
    return defaultValue
  }
  if (!/^\d+$/.test(value)) {
    return null
  }
  return Number.parseInt(value, 10)
}

function pickColumns(features: Features, columns: readonly string[]): Features {
  const picked: Features = {}
  for (const column of columns) {
    const feature = features[column]
    if (feature) {
      picked[column] = feature
    }
  }
  return picked
}

/**
 * Make a cell value serializable as JSON
 *
 * Bytes left in a supported column are sent as base64.
 */
function toJsonValue(value: unknown): unknown {
  if (value instanceof Uint8Array) {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('base64')
  }
  if (typeof value === 'bigint') {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString()
  }
  if (value instanceof Date) {
    return value.toISOString()
  }
  if (Array.isArray(value)) {
    return value.map(toJsonValue)
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, toJsonValue(item)]))
  }
  return value
}

function toJsonRow(row: Row): Row {
  return Object.fromEntries(Object.entries(row).map(([column, value]) => [column, toJsonValue(value)]))
}

// =============================================================================
// Routes
// =============================================================================

/**
 * Create the rows API routes
 */
export function createRowsRoutes(options: RowsRoutesOptions) {
  const app = new Hono()
  const rowsMaxLength = options.rowsMaxLength ?? DEFAULT_ROWS_MAX_LENGTH

  /**
   * GET /rows
   *
   * @query offset - first row, default 0
   * @query length - number of rows, default and maximum `rowsMaxLength`
   * @returns RowsResponse
   */
  app.get('/rows', async (c) => {
    const offset = parseIntegerParam(c.req.query('offset'), 0)
    if (offset === null) {
      return c.json(
        { error: 'Parameter "offset" must be a non-negative integer', code: ErrorCode.INVALID_INPUT },
        400
      )
    }
    const length = parseIntegerParam(c.req.query('length'), rowsMaxLength)
    if (length === null || length < 1 || length > rowsMaxLength) {
      return c.json(
        {
          error: `Parameter "length" must be an integer between 1 and ${rowsMaxLength}`,
          code: ErrorCode.INVALID_INPUT,
        },
        400
      )
    }

    try {
      const allFeatures = await options.source.getFeatures()
      const { supported } = getSupportedUnsupportedColumns(
        allFeatures,
        options.unsupportedFeatures ?? DEFAULT_UNSUPPORTED_FEATURES
      )
      const features = pickColumns(allFeatures, supported)

      const [numRowsTotal, rows] = await Promise.all([
        options.source.getNumRows(),
        options.source.readRows(offset, length),
      ])

      const transformed = await transformRows({
        rows,
        features,
        offset,
        context: {
          location: options.location,
          storage: options.storage,
          imageFormats: options.imageFormats,
          supportedAudioExtensions: options.supportedAudioExtensions,
          transcoder: options.transcoder,
        },
        concurrency: options.concurrency,
      })

      const response: RowsResponse = {
        features: toFeaturesList(features),
        rows: transformed.map((row, index) => ({
          row_idx: offset + index,
          row: toJsonRow(row),
          truncated_cells: [],
        })),
        num_rows_total: numRowsTotal,
        num_rows_per_page: rowsMaxLength,
        partial: false,
      }
      return c.json(response)
    } catch (error) {
      logger.error('[RowsAPI] Error reading rows:', error)
      return c.json(errorBody(error), statusForError(error))
    }
  })

  return app
}
