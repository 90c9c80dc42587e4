/**
 * Schema-directed cell transformation
 *
 * Walks a cell alongside its feature type: media leaves are stored and
 * replaced by asset references, containers are rebuilt element by element,
 * scalars pass through untouched.
 *
 * @module features/cell
 */

import type { FeatureType } from '../types/features'
import type { StructuralPath } from '../types/row'
import { ArityMismatchError, TypeMismatchError, UnknownFeatureTypeError } from '../errors'
import { describeValue, isPlainObject } from '../utils/describe'
import type { AssetContext } from './encoders/context'
import { encodeImage } from './encoders/image'
import { encodeAudio } from './encoders/audio'
import { encodeVideo } from './encoders/video'
import { encodeDocument } from './encoders/document'

export interface CellInput {
  feature: FeatureType
  cell: unknown
  /** Location of `cell` inside the column's value */
  path: StructuralPath
  context: AssetContext
  rowIdx: number
  column: string
}

/**
 * Transform one cell (or a value nested in one) according to its feature type
 *
 * @returns the transformed value; null for a null or undefined cell
 * @throws TypeMismatchError when the cell's shape does not fit the feature
 * @throws ArityMismatchError when a fixed-length list has the wrong length
 * @throws UnknownFeatureTypeError for a feature outside the known variants
 */
export async function getCellValue(input: CellInput): Promise<unknown> {
  const { feature, cell, path, context, rowIdx, column } = input
  if (cell === null || cell === undefined) {
    return null
  }

  switch (feature._type) {
    case 'Image':
      return encodeImage({ context, rowIdx, value: cell, column, path })
    case 'Audio':
      return encodeAudio({ context, rowIdx, value: cell, column, path })
    case 'Video':
      return encodeVideo({ context, rowIdx, value: cell, column, path })
    case 'Pdf':
      return encodeDocument({ context, rowIdx, value: cell, column, path })

    case 'List':
    case 'LargeList': {
      if (!Array.isArray(cell)) {
        throw new TypeMismatchError(
          `A list cell must be an array, but got ${describeValue(cell)}`,
          { column, rowIdx, path, expected: feature._type }
        )
      }
      if (feature._type === 'List' && feature.length >= 0 && cell.length !== feature.length) {
        throw new ArityMismatchError(feature.length, cell.length, { column, rowIdx, path })
      }
      const values: unknown[] = []
      for (const [index, item] of cell.entries()) {
        values.push(
          await getCellValue({
            feature: feature.feature,
            cell: item,
            path: [...path, index],
            context,
            rowIdx,
            column,
          })
        )
      }
      return values
    }

    case 'Struct': {
      if (!isPlainObject(cell)) {
        throw new TypeMismatchError(
          `A struct cell must be an object, but got ${describeValue(cell)}`,
          { column, rowIdx, path, expected: 'Struct' }
        )
      }
      const result: Record<string, unknown> = {}
      for (const [key, value] of Object.entries(cell)) {
        const field = Object.hasOwn(feature.fields, key) ? feature.fields[key] : undefined
        if (field === undefined) {
          throw new TypeMismatchError(`Struct cell has a field "${key}" its feature does not declare`, {
            column,
            rowIdx,
            path: [...path, key],
            expected: 'Struct',
          })
        }
        result[key] = await getCellValue({
          feature: field,
          cell: value,
          path: [...path, key],
          context,
          rowIdx,
          column,
        })
      }
      return result
    }

    case 'Value':
    case 'ClassLabel':
    case 'Translation':
    case 'TranslationVariableLanguages':
    case 'Array2D':
    case 'Array3D':
    case 'Array4D':
    case 'Array5D':
      return cell

    default: {
      const unknownFeature: never = feature
      throw new UnknownFeatureTypeError(featureTypeName(unknownFeature), { column, rowIdx, path })
    }
  }
}

function featureTypeName(feature: unknown): string {
  if (isPlainObject(feature) && typeof feature._type === 'string') {
    return feature._type
  }
  return describeValue(feature)
}
