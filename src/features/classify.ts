/**
 * Schema-only column classification
 *
 * @module features/classify
 */

import type { FeatureType, FeatureTypeName, Features } from '../types/features'

/**
 * Visit a feature and every feature nested in it, parents first
 */
export function visitFeature(feature: FeatureType, visit: (node: FeatureType) => void): void {
  visit(feature)
  switch (feature._type) {
    case 'List':
    case 'LargeList':
      visitFeature(feature.feature, visit)
      break
    case 'Struct':
      for (const field of Object.values(feature.fields)) {
        visitFeature(field, visit)
      }
      break
    default:
      break
  }
}

/**
 * Whether a feature or any feature nested in it satisfies a predicate
 */
export function someFeature(feature: FeatureType, predicate: (node: FeatureType) => boolean): boolean {
  if (predicate(feature)) {
    return true
  }
  switch (feature._type) {
    case 'List':
    case 'LargeList':
      return someFeature(feature.feature, predicate)
    case 'Struct':
      return Object.values(feature.fields).some(field => someFeature(field, predicate))
    default:
      return false
  }
}

/**
 * Whether any feature of the schema, at any depth, has one of the given types
 *
 * @example
 * ```typescript
 * featuresContain({ images: List(Image()) }, ['Image']) // true
 * ```
 */
export function featuresContain(features: Features, types: readonly FeatureTypeName[]): boolean {
  return Object.values(features).some(feature =>
    someFeature(feature, node => types.includes(node._type))
  )
}

function matches(node: FeatureType, unsupported: FeatureType): boolean {
  if (node._type !== unsupported._type) {
    return false
  }
  if (node._type === 'Value' && unsupported._type === 'Value') {
    return node.dtype === unsupported.dtype
  }
  return true
}

export interface ColumnClassification {
  supported: string[]
  unsupported: string[]
}

/**
 * Split the schema's columns by whether any of their nested features is one
 * of the unsupported ones
 *
 * Features match on their type, plus their dtype for `Value` features.
 *
 * @example
 * ```typescript
 * getSupportedUnsupportedColumns({ a: Image(), b: Value('int32') }, [Value('int32')])
 * // { supported: ['a'], unsupported: ['b'] }
 * ```
 */
export function getSupportedUnsupportedColumns(
  features: Features,
  unsupportedFeatures: readonly FeatureType[] = []
): ColumnClassification {
  const supported: string[] = []
  const unsupported: string[] = []

  for (const [column, feature] of Object.entries(features)) {
    const isUnsupported = someFeature(feature, node =>
      unsupportedFeatures.some(entry => matches(node, entry))
    )
    ;(isUnsupported ? unsupported : supported).push(column)
  }

  return { supported, unsupported }
}
