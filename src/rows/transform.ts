/**
 * Row and batch transformation
 *
 * @module rows/transform
 */

import { setImmediate } from 'node:timers/promises'
import type { Features } from '../types/features'
import type { Row } from '../types/row'
import { TypeMismatchError } from '../errors'
import { describeValue } from '../utils/describe'
import { logger } from '../utils/logger'
import { getCellValue } from '../features/cell'
import type { AssetContext } from '../features/encoders/context'
import { mapWithStrategy, selectExecutionStrategy } from './strategy'

export interface TransformRowInput {
  row: Row
  features: Features
  /** Position of the row in the dataset */
  rowIdx: number
  /** Column holding the row's index, which then takes precedence over `rowIdx` */
  rowIdxColumn?: string | undefined
  context: AssetContext
}

function resolveRowIdx(input: TransformRowInput): number {
  const { row, rowIdx, rowIdxColumn } = input
  if (rowIdxColumn === undefined || !(rowIdxColumn in row)) {
    return rowIdx
  }
  const value = row[rowIdxColumn]
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value
  }
  if (typeof value === 'bigint') {
    return Number(value)
  }
  throw new TypeMismatchError(
    `Row index column "${rowIdxColumn}" must hold an integer, but got ${describeValue(value)}`,
    { column: rowIdxColumn, rowIdx, expected: 'integer' }
  )
}

/**
 * Transform every schema column of a row, in schema order
 *
 * The input row is left untouched. Columns missing from the row become null;
 * row columns outside the schema are dropped, except for the row index column.
 */
export async function transformRow(input: TransformRowInput): Promise<Row> {
  const { row, features, rowIdxColumn, context } = input
  const rowIdx = resolveRowIdx(input)

  const transformed: Row = {}
  for (const [column, feature] of Object.entries(features)) {
    transformed[column] = await getCellValue({
      feature,
      cell: row[column],
      path: [],
      context,
      rowIdx,
      column,
    })
  }

  if (rowIdxColumn !== undefined && rowIdxColumn in row && !(rowIdxColumn in transformed)) {
    transformed[rowIdxColumn] = row[rowIdxColumn]
  }
  return transformed
}

export interface TransformRowsInput {
  rows: readonly Row[]
  features: Features
  /** Dataset position of `rows[0]` */
  offset: number
  rowIdxColumn?: string | undefined
  context: AssetContext
  /** Rows transformed at once when the schema carries media */
  concurrency?: number | undefined
}

/**
 * Transform a batch of rows, keeping their order
 *
 * @throws the error of the first row that fails; no partial batch is returned
 */
export async function transformRows(input: TransformRowsInput): Promise<Row[]> {
  const { rows, features, offset, rowIdxColumn, context } = input
  const strategy = selectExecutionStrategy(features, input.concurrency)

  // Start on a later turn of the event loop
  await setImmediate()

  logger.debug(`Transforming ${rows.length} rows from offset ${offset} (${strategy.kind})`)
  const transformed = await mapWithStrategy(
    rows,
    async (row, index) => {
      const rowIdx = offset + index
      try {
        return await transformRow({ row, features, rowIdx, rowIdxColumn, context })
      } catch (error: unknown) {
        logger.error(`Failed to transform row ${rowIdx}`, error)
        throw error
      }
    },
    strategy
  )
  logger.debug(`Transformed ${transformed.length} rows from offset ${offset}`)
  return transformed
}
